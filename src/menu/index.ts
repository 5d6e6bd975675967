import * as readline from 'readline/promises';
import { isYes, resultLabel } from '../app';
import { type CommandContext, logMetrics, runBulk, runCountries, runLookup, runResults, runStatus } from '../commands';
import type { BatchResult } from '../types';
import { APP_NAME, VERSION } from '../version';

/** Line-oriented input. `ask` resolves null once input has ended. */
export interface Prompt {
    ask(question: string): Promise<string | null>;
    /** Handler for Ctrl+C while a batch runs; null restores the default (end input). */
    onInterrupt(handler: (() => void) | null): void;
    close(): void;
}

export function createReadlinePrompt(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
): Prompt {
    const rl = readline.createInterface({ input, output });
    let closed = false;
    let interrupt: (() => void) | null = null;
    const ended = new Promise<null>(resolve => rl.once('close', () => {
        closed = true;
        resolve(null);
    }));

    rl.on('SIGINT', () => {
        if (interrupt) interrupt();
        else rl.close();
    });

    return {
        ask(question: string): Promise<string | null> {
            if (closed) return Promise.resolve(null);
            const answer = rl.question(question).catch((error: unknown) => {
                if (closed) return null;
                throw error;
            });
            return Promise.race([answer, ended]);
        },
        onInterrupt(handler) {
            interrupt = handler;
        },
        close() {
            rl.close();
        },
    };
}

const MENU_OPTIONS = [
    'Single Number Lookup',
    'Bulk Number Lookup',
    'View Saved Results',
    'Country Codes',
    'Check API Status',
    'Exit',
];

export class InteractiveMenu {
    constructor(private readonly ctx: CommandContext, private readonly prompt: Prompt) {}

    private get renderer() {
        return this.ctx.app.renderer;
    }

    private show(): void {
        const { print } = this.ctx;
        print('');
        print(this.renderer.paint('cyan', `=== ${APP_NAME} v${VERSION} ===`));
        MENU_OPTIONS.forEach((label, i) => print(`${this.renderer.paint('green', `${i + 1}.`)} ${label}`));
        print('');
    }

    /** Runs until the user exits or input ends. */
    async run(): Promise<void> {
        for (;;) {
            this.show();
            const choice = await this.prompt.ask(`Select option (1-${MENU_OPTIONS.length}): `);
            if (choice === null) {
                logMetrics(this.ctx);
                return;
            }

            try {
                switch (choice.trim()) {
                    case '1': await this.singleLookup(); break;
                    case '2': await this.bulkLookup(); break;
                    case '3': await this.viewSaved(); break;
                    case '4': runCountries(this.ctx); break;
                    case '5': await runStatus(this.ctx); break;
                    case '6':
                        logMetrics(this.ctx);
                        this.ctx.print(this.renderer.message('success', `Thank you for using ${APP_NAME}!`));
                        return;
                    default:
                        this.ctx.print(this.renderer.message('error', `Invalid choice! Please select 1-${MENU_OPTIONS.length}.`));
                }
            } catch (error: unknown) {
                const err = error instanceof Error ? error : new Error(String(error));
                this.ctx.app.logger.error(`Menu action failed: ${err.message}`, { stack: err.stack });
                this.ctx.print(this.renderer.message('error', `Unexpected error: ${err.message}`));
            }
        }
    }

    private async askCountry(): Promise<string | null> {
        const fallback = this.ctx.app.orchestrator.defaultCountry;
        const answer = await this.prompt.ask(`Country code (IN, US, BD etc) [${fallback}]: `);
        if (answer === null) return null;
        return answer.trim().toUpperCase() || fallback;
    }

    private async singleLookup(): Promise<void> {
        const { print, app } = this.ctx;
        print(this.renderer.heading('SINGLE NUMBER LOOKUP'));

        const number = await this.prompt.ask('Enter phone number: ');
        if (number === null) return;
        if (number.trim() === '') {
            print(this.renderer.message('error', 'Phone number required!'));
            return;
        }
        const country = await this.askCountry();
        if (country === null) return;

        const outcome = await runLookup(this.ctx, number.trim(), { country });
        if (isYes(await this.prompt.ask('Save results? (y/n): '))) {
            const saved = await app.store.saveSingle(resultLabel(number, country), outcome);
            print(this.renderer.message('success', `Results saved to: ${saved}`));
        }
    }

    private async bulkLookup(): Promise<void> {
        const { print, app } = this.ctx;
        print(this.renderer.heading('BULK NUMBER LOOKUP'));
        print(this.renderer.message('info', "Enter phone numbers (one per line). Type 'done' to finish:"));
        print(this.renderer.message('warning', 'Note: Bulk search may take time due to rate limiting'));

        const numbers: string[] = [];
        for (;;) {
            const line = await this.prompt.ask('');
            if (line === null || line.trim().toLowerCase() === 'done') break;
            if (line.trim() !== '') numbers.push(line.trim());
        }
        if (numbers.length === 0) {
            print(this.renderer.message('error', 'No numbers provided!'));
            return;
        }

        if (numbers.length > app.config.batch.confirm_above) {
            print(this.renderer.message('warning', `You entered ${numbers.length} numbers. This may take a while.`));
            if (!isYes(await this.prompt.ask('Continue? (y/n): '))) return;
        }

        const country = await this.askCountry();
        if (country === null) return;

        const controller = new AbortController();
        this.prompt.onInterrupt(() => controller.abort());
        let batch: BatchResult | undefined;
        try {
            batch = await runBulk(this.ctx, numbers, { country, signal: controller.signal });
        } finally {
            this.prompt.onInterrupt(null);
        }
        if (!batch) return;

        if (isYes(await this.prompt.ask('Save all results? (y/n): '))) {
            const saved = await app.store.saveBulk(batch);
            print(this.renderer.message('success', `Results saved to: ${saved}`));
        }
    }

    private async viewSaved(): Promise<void> {
        const files = await this.ctx.app.store.list();
        this.renderer.savedList(files).forEach(line => this.ctx.print(line));
        if (files.length === 0) return;

        const choice = await this.prompt.ask('Select file to view (0 to cancel): ');
        if (choice === null || choice.trim() === '0') return;

        const index = Number.parseInt(choice.trim(), 10) - 1;
        const file = Number.isInteger(index) ? files[index] : undefined;
        if (!file) {
            this.ctx.print(this.renderer.message('error', 'Invalid selection!'));
            return;
        }
        await runResults(this.ctx, file);
    }
}

import { type App, resultLabel } from './app';
import { redactConfig, saveConfig } from './config';
import { readNumbersFile } from './modules/ingestor';
import { Normalizer } from './modules/normalizer';
import type { BatchResult, EndpointStatus, LookupOutcome } from './types';
import { StoreError } from './utils/errors';

export interface CommandContext {
    app: App;
    print: (line: string) => void;
}

export interface LookupCommandOptions {
    country?: string;
    save?: boolean;
    json?: boolean;
}

export interface BulkCommandOptions extends LookupCommandOptions {
    file?: string;
    signal?: AbortSignal;
}

function printLines(ctx: CommandContext, lines: string[]): void {
    lines.forEach(line => ctx.print(line));
}

/** Outcome counters of every lookup this session has made. */
export function logMetrics(ctx: CommandContext): void {
    ctx.app.logger.info('Lookup metrics', ctx.app.orchestrator.metrics.getSummary());
}

function countryOf(ctx: CommandContext, country?: string): string {
    const hint = (country ?? ctx.app.orchestrator.defaultCountry).trim().toUpperCase();
    if (!Normalizer.resolveCountry(hint)) {
        ctx.app.logger.warn(`Country code ${hint} is not in the country table; numbers will only get a + prefix`);
    }
    return hint;
}

export async function runLookup(ctx: CommandContext, number: string, options: LookupCommandOptions = {}): Promise<LookupOutcome> {
    const { renderer, orchestrator, store } = ctx.app;
    const country = countryOf(ctx, options.country);
    const outcome = await orchestrator.lookup(number, country);

    if (options.json) ctx.print(JSON.stringify(outcome, null, 2));
    else printLines(ctx, renderer.result(outcome, number));

    if (options.save) {
        const saved = await store.saveSingle(resultLabel(number, country), outcome);
        ctx.print(renderer.message('success', `Results saved to: ${saved}`));
    }
    return outcome;
}

export async function runBulk(ctx: CommandContext, numbers: string[], options: BulkCommandOptions = {}): Promise<BatchResult | undefined> {
    const { renderer, orchestrator, store } = ctx.app;
    const inputs = [...numbers];
    if (options.file) {
        try {
            inputs.push(...await readNumbersFile(options.file));
        } catch (error: unknown) {
            const reason = error instanceof Error ? error.message : String(error);
            ctx.app.logger.warn(`Numbers file ${options.file} unreadable`, { error: reason });
            ctx.print(renderer.message('error', `Cannot read numbers file ${options.file}: ${reason}`));
            return undefined;
        }
    }

    if (inputs.length === 0) {
        ctx.print(renderer.message('error', 'No numbers provided!'));
        return undefined;
    }

    const country = countryOf(ctx, options.country);
    const batch = await orchestrator.bulkLookup(inputs, country, {
        signal: options.signal,
        onProgress: (index, total, input) => {
            if (!options.json) ctx.print(renderer.message('info', `Processing ${index}/${total}: ${input}`));
        },
    });

    logMetrics(ctx);

    if (options.json) ctx.print(JSON.stringify(batch, null, 2));
    else printLines(ctx, renderer.batch(batch));

    if (options.save) {
        const saved = await store.saveBulk(batch);
        ctx.print(renderer.message('success', `Results saved to: ${saved}`));
    }
    return batch;
}

export async function runResults(ctx: CommandContext, file?: string): Promise<void> {
    const { renderer, store } = ctx.app;
    if (!file) {
        printLines(ctx, renderer.savedList(await store.list()));
        return;
    }
    try {
        const data = await store.read(file);
        ctx.print(renderer.heading(file));
        ctx.print(JSON.stringify(data, null, 2));
    } catch (error: unknown) {
        if (!(error instanceof StoreError)) throw error;
        ctx.print(renderer.message('error', error.message));
    }
}

export function runCountries(ctx: CommandContext): void {
    printLines(ctx, ctx.app.renderer.countries(Normalizer.listCountries()));
}

export async function runStatus(ctx: CommandContext): Promise<EndpointStatus[]> {
    const { renderer, orchestrator } = ctx.app;
    ctx.print(renderer.message('info', 'Testing connection to the lookup service...'));
    const statuses = await orchestrator.checkStatus();
    printLines(ctx, renderer.status(statuses));
    ctx.print(statuses.some(s => s.reachable)
        ? renderer.message('success', 'API is accessible and working')
        : renderer.message('error', 'API is not accessible. Check your internet connection.'));
    return statuses;
}

export function runConfig(ctx: CommandContext, writePath?: string): void {
    if (writePath) {
        saveConfig(ctx.app.config, writePath);
        ctx.print(ctx.app.renderer.message('success', `Config written to: ${writePath}`));
        return;
    }
    ctx.print(JSON.stringify(redactConfig(ctx.app.config), null, 2));
}

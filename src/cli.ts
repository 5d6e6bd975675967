#!/usr/bin/env node
import { Command } from 'commander';
import path from 'path';
import { type App, createApp } from './app';
import {
    type CommandContext,
    runBulk,
    runConfig,
    runCountries,
    runLookup,
    runResults,
    runStatus,
} from './commands';
import { loadDotenv } from './config';
import { InteractiveMenu, createReadlinePrompt } from './menu';
import { createLogger } from './modules/observability';
import { ErrorHandler } from './utils/error_handler';
import { MIN_NODE_MAJOR, isSupportedRuntime } from './utils/runtime';
import { APP_NAME, VERSION } from './version';

type GlobalOptions = {
    config?: string;
    mock?: string;
    color: boolean;
};

const program = new Command();

program
    .name(APP_NAME)
    .description('Caller-identification lookups for phone numbers')
    .version(VERSION)
    .option('--config <path>', 'Path to a config YAML file')
    .option('--mock <file>', 'Answer lookups from a local JSON directory instead of the network')
    .option('--no-color', 'Disable coloured output');

function context(): CommandContext {
    const options = program.opts<GlobalOptions>();
    const app: App = createApp({
        configPath: options.config ? path.resolve(options.config) : undefined,
        mockFile: options.mock ? path.resolve(options.mock) : undefined,
        color: options.color && Boolean(process.stdout.isTTY) && !process.env.NO_COLOR,
    });
    return { app, print: line => console.log(line) };
}

async function runMenu(): Promise<void> {
    const ctx = context();
    const prompt = createReadlinePrompt();
    try {
        await new InteractiveMenu(ctx, prompt).run();
    } finally {
        prompt.close();
    }
}

program
    .command('menu', { isDefault: true })
    .description('Interactive menu (default)')
    .action(runMenu);

program
    .command('lookup <number>')
    .description('Look up one phone number')
    .option('-c, --country <code>', 'Country hint, e.g. IN, US, BD')
    .option('--save', 'Save the result as JSON')
    .option('--json', 'Print the raw result as JSON')
    .action(async (number: string, options: { country?: string; save?: boolean; json?: boolean }) => {
        await runLookup(context(), number, options);
    });

program
    .command('bulk [numbers...]')
    .description('Look up several numbers one after another')
    .option('-f, --file <path>', 'Read numbers from a text or CSV file')
    .option('-c, --country <code>', 'Country hint, e.g. IN, US, BD')
    .option('--save', 'Save the batch as JSON')
    .option('--json', 'Print the batch as JSON')
    .action(async (numbers: string[], options: { file?: string; country?: string; save?: boolean; json?: boolean }) => {
        const controller = new AbortController();
        const onInterrupt = () => controller.abort();
        process.once('SIGINT', onInterrupt);
        try {
            await runBulk(context(), numbers, {
                ...options,
                file: options.file ? path.resolve(options.file) : undefined,
                signal: controller.signal,
            });
        } finally {
            process.removeListener('SIGINT', onInterrupt);
        }
    });

program
    .command('results [file]')
    .description('List saved results, or print one of them')
    .action(async (file?: string) => {
        await runResults(context(), file);
    });

program
    .command('countries')
    .description('List supported country codes')
    .action(() => runCountries(context()));

program
    .command('status')
    .description('Check whether the lookup endpoints are reachable')
    .action(async () => {
        await runStatus(context());
    });

program
    .command('config')
    .description('Print the effective configuration')
    .option('--write <path>', 'Write the effective configuration as YAML')
    .action((options: { write?: string }) => {
        runConfig(context(), options.write ? path.resolve(options.write) : undefined);
    });

async function main(argv: string[]): Promise<void> {
    if (!isSupportedRuntime()) {
        console.error(`${APP_NAME} needs Node.js ${MIN_NODE_MAJOR} or newer (running ${process.versions.node})`);
        process.exit(1);
    }
    loadDotenv();
    await program.parseAsync(argv);
}

const bootstrapLogger = createLogger({ level: 'warn' });
ErrorHandler.install(bootstrapLogger);

main(process.argv).catch(error => ErrorHandler.handleFatalError(error, bootstrapLogger));

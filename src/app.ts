import path from 'path';
import winston from 'winston';
import { type AppConfig, DEFAULT_CONFIG_PATH, loadConfig } from './config';
import { Normalizer } from './modules/normalizer';
import { createLogger } from './modules/observability';
import { LookupOrchestrator, type Sleep, settingsFromConfig } from './modules/orchestrator';
import { Renderer } from './modules/renderer';
import { ResultStore } from './modules/store';
import { AxiosTransport, type Transport } from './modules/transport';
import { MockTransport } from './modules/transport/mock';

export interface AppOptions {
    configPath?: string;
    /** JSON directory answering lookups in process instead of the network. */
    mockFile?: string;
    color?: boolean;
    env?: NodeJS.ProcessEnv;
    /** Overrides both the real and the mock transport. */
    transport?: Transport;
    logger?: winston.Logger;
    sleep?: Sleep;
    clock?: () => Date;
}

export interface App {
    config: AppConfig;
    logger: winston.Logger;
    orchestrator: LookupOrchestrator;
    store: ResultStore;
    renderer: Renderer;
}

/**
 * Wires config, transport, orchestrator and store. Nothing here is module-level state.
 */
export function createApp(options: AppOptions = {}): App {
    const config = loadConfig(options.configPath ?? DEFAULT_CONFIG_PATH, options.env ?? process.env);
    const logger = options.logger ?? createLogger({ level: config.logging.level, dir: config.logging.dir });
    const transport = options.transport
        ?? (options.mockFile ? MockTransport.fromFile(options.mockFile) : new AxiosTransport());

    if (options.mockFile && !options.transport) logger.info(`Answering lookups from ${options.mockFile}`);

    const orchestrator = new LookupOrchestrator(settingsFromConfig(config), {
        transport,
        logger,
        sleep: options.sleep,
        clock: options.clock,
    });

    return {
        config,
        logger,
        orchestrator,
        store: new ResultStore(path.resolve(config.storage.results_dir), options.clock),
        renderer: new Renderer(options.color ?? false),
    };
}

/** File label for a saved single lookup: the normalized number when there is one. */
export function resultLabel(rawNumber: string, countryHint: string): string {
    const normalized = Normalizer.normalize(rawNumber, countryHint);
    return normalized.status === 'OK' ? normalized.number : rawNumber.trim();
}

export function isYes(answer: string | null): boolean {
    return answer !== null && ['y', 'yes'].includes(answer.trim().toLowerCase());
}

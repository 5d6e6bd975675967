import fs from 'fs';
import os from 'os';
import path from 'path';
import { type App, createApp } from '../src/app';
import type { CommandContext } from '../src/commands';
import { createLogger } from '../src/modules/observability';
import type { LookupSettings, Sleep } from '../src/modules/orchestrator';
import type { Transport, TransportResponse } from '../src/modules/transport';
import { MockTransport } from '../src/modules/transport/mock';

export const PRIMARY = 'https://primary.test/v2/search';
export const FALLBACK_1 = 'https://fallback-1.test/v2/search';
export const FALLBACK_2 = 'https://fallback-2.test/v2/search';

export const MOCK_DIRECTORY = path.resolve(__dirname, '..', 'data', 'mock-directory.json');

export const silentLogger = () => createLogger({ silent: true });

export function testSettings(overrides: Partial<LookupSettings> = {}): LookupSettings {
    return {
        endpoints: [PRIMARY, FALLBACK_1, FALLBACK_2],
        headers: { 'User-Agent': 'numscope-test', 'Authorization': 'Bearer test-secret' },
        timeout_ms: 5000,
        search_type: '4',
        placement: 'SEARCHRESULTS',
        default_country: 'BD',
        status_probe_number: '+12025550123',
        delay_ms: 1000,
        extra_pause_every: 3,
        extra_pause_ms: 5000,
        ...overrides,
    };
}

/** Sleep stand-in that resolves at once and remembers every delay. */
export function recordingSleep(): { sleep: Sleep; calls: number[] } {
    const calls: number[] = [];
    return {
        calls,
        sleep: async (ms: number) => {
            calls.push(ms);
        },
    };
}

export function ok(body: unknown): TransportResponse {
    return { status: 200, body: JSON.stringify(body) };
}

export const FIXED_NOW = new Date('2026-01-02T03:04:05.000Z');

export function tempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'numscope-'));
}

/** Fixed local time; saved files are named 20260102_030405. */
export const LOCAL_NOW = new Date(2026, 0, 2, 3, 4, 5);

/** Full app on the bundled mock directory, writing results to a fresh temp dir. */
export function testApp(options: { transport?: Transport; env?: NodeJS.ProcessEnv } = {}) {
    const resultsDir = tempDir();
    const { sleep, calls } = recordingSleep();
    const app: App = createApp({
        env: { RESULTS_DIR: resultsDir, ...options.env },
        transport: options.transport ?? MockTransport.fromFile(MOCK_DIRECTORY),
        logger: silentLogger(),
        sleep,
        clock: () => LOCAL_NOW,
    });
    const output: string[] = [];
    const ctx: CommandContext = { app, print: line => output.push(line) };
    return { app, ctx, output, resultsDir, sleeps: calls };
}

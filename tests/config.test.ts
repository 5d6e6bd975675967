import fs from 'fs';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG_PATH, loadConfig, redactConfig, saveConfig } from '../src/config';
import { ConfigurationError } from '../src/utils/errors';
import { tempDir } from './helpers';

function configError(run: () => unknown): ConfigurationError {
    try {
        run();
    } catch (error: unknown) {
        if (error instanceof ConfigurationError) return error;
        throw error;
    }
    throw new Error('expected a ConfigurationError');
}

describe('loadConfig', () => {
    it('loads the bundled defaults', () => {
        const config = loadConfig(DEFAULT_CONFIG_PATH, {});

        expect(config.api.primary_url).toBe('https://search5-noneu.lookup.example.com/v2/search');
        expect(config.api.fallback_urls).toHaveLength(2);
        expect(config.api.timeout_ms).toBe(15000);
        expect(config.api.token).toBeUndefined();
        expect(config.api.search_type).toBe('4');
        expect(config.lookup.default_country).toBe('IN');
        expect(config.batch).toEqual({ delay_ms: 1500, extra_pause_every: 3, extra_pause_ms: 3000, confirm_above: 10 });
        expect(config.storage.results_dir).toBe('results');
        expect(config.logging.level).toBe('warn');
    });

    it('applies environment overrides', () => {
        const config = loadConfig(DEFAULT_CONFIG_PATH, {
            LOOKUP_API_TOKEN: 'test-secret',
            LOOKUP_PRIMARY_URL: 'https://primary.test/v2/search',
            LOOKUP_FALLBACK_URLS: '',
            LOOKUP_TIMEOUT_MS: '5000',
            DEFAULT_COUNTRY: 'bd',
            RESULTS_DIR: '/tmp/numscope-results',
            LOG_LEVEL: 'debug',
        });

        expect(config.api.token).toBe('test-secret');
        expect(config.api.primary_url).toBe('https://primary.test/v2/search');
        expect(config.api.fallback_urls).toEqual([]);
        expect(config.api.timeout_ms).toBe(5000);
        expect(config.lookup.default_country).toBe('BD');
        expect(config.storage.results_dir).toBe('/tmp/numscope-results');
        expect(config.logging.level).toBe('debug');
    });

    it('splits a comma separated fallback list', () => {
        const config = loadConfig(DEFAULT_CONFIG_PATH, { LOOKUP_FALLBACK_URLS: 'https://a.test/x, https://b.test/y' });
        expect(config.api.fallback_urls).toEqual(['https://a.test/x', 'https://b.test/y']);
    });

    it('lists every invalid setting', () => {
        const error = configError(() => loadConfig(DEFAULT_CONFIG_PATH, { LOOKUP_PRIMARY_URL: 'not-a-url', LOG_LEVEL: 'loud' }));

        expect(error.code).toBe('CONFIG_ERROR');
        expect(error.issues).toHaveLength(2);
        expect(error.issues[0]).toMatch(/^api\.primary_url: /);
        expect(error.issues[1]).toMatch(/^logging\.level: /);
    });

    it('fails on a missing file', () => {
        const missing = path.join(tempDir(), 'absent.yaml');
        expect(configError(() => loadConfig(missing, {})).message).toMatch(/^Cannot read config file/);
    });

    it('fails when the top level is not a mapping', () => {
        const file = path.join(tempDir(), 'list.yaml');
        fs.writeFileSync(file, '- a\n- b\n');
        expect(configError(() => loadConfig(file, {})).message).toBe(`Config file ${file} must contain a mapping at the top level`);
    });

    it('fails when required settings are missing', () => {
        const file = path.join(tempDir(), 'empty.yaml');
        fs.writeFileSync(file, '');
        expect(configError(() => loadConfig(file, {})).issues.some(i => i.startsWith('api.primary_url: '))).toBe(true);
    });
});

describe('redactConfig and saveConfig', () => {
    it('hides the token', () => {
        const config = loadConfig(DEFAULT_CONFIG_PATH, { LOOKUP_API_TOKEN: 'test-secret' });
        expect(redactConfig(config).api.token).toBe('***');
        expect(redactConfig(loadConfig(DEFAULT_CONFIG_PATH, {})).api.token).toBeUndefined();
    });

    it('writes a config that loads back without the token', () => {
        const config = loadConfig(DEFAULT_CONFIG_PATH, { LOOKUP_API_TOKEN: 'test-secret', DEFAULT_COUNTRY: 'US' });
        const file = path.join(tempDir(), 'saved', 'config.yaml');

        saveConfig(config, file);

        expect(fs.readFileSync(file, 'utf8')).not.toContain('test-secret');
        expect(loadConfig(file, {})).toEqual({ ...config, api: { ...config.api, token: undefined } });
    });
});

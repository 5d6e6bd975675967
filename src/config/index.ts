import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

export const DEFAULT_CONFIG_PATH = path.resolve(__dirname, '../../config/default.yaml');

const CountryHint = z.string().trim().min(2).max(2).transform(s => s.toUpperCase());

/**
 * 📋 CONFIG SCHEMA
 * Mirrors config/default.yaml. Every policy constant of the tool lives here.
 */
const ConfigSchema = z.object({
    api: z.object({
        primary_url: z.string().url(),
        fallback_urls: z.array(z.string().url()).default([]),
        timeout_ms: z.coerce.number().int().min(1000).max(120000).default(15000),
        user_agent: z.string().min(1),
        accept_language: z.string().default('en-US'),
        token: z.string().optional(),
        search_type: z.coerce.string().default('4'),
        placement: z.string().default('SEARCHRESULTS,HISTORY,DETAILS'),
        status_probe_number: z.string().min(1),
    }),
    lookup: z.object({
        default_country: CountryHint.default('IN'),
    }),
    batch: z.object({
        delay_ms: z.coerce.number().int().min(0).default(1500),
        extra_pause_every: z.coerce.number().int().min(1).default(3),
        extra_pause_ms: z.coerce.number().int().min(0).default(3000),
        confirm_above: z.coerce.number().int().min(1).default(10),
    }),
    storage: z.object({
        results_dir: z.string().min(1).default('results'),
    }),
    logging: z.object({
        level: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('warn'),
        dir: z.string().optional(),
    }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/** Environment variables that override the YAML file. */
const EnvSchema = z.object({
    LOOKUP_API_TOKEN: z.string().optional(),
    LOOKUP_PRIMARY_URL: z.string().optional(),
    LOOKUP_FALLBACK_URLS: z.string().optional(),
    LOOKUP_TIMEOUT_MS: z.string().optional(),
    DEFAULT_COUNTRY: z.string().optional(),
    RESULTS_DIR: z.string().optional(),
    LOG_LEVEL: z.string().optional(),
    LOG_DIR: z.string().optional(),
});

type EnvOverrides = z.infer<typeof EnvSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = raw[key];
    return isRecord(value) ? { ...value } : {};
}

function applyEnv(raw: Record<string, unknown>, env: EnvOverrides): Record<string, unknown> {
    const api = section(raw, 'api');
    const lookup = section(raw, 'lookup');
    const storage = section(raw, 'storage');
    const logging = section(raw, 'logging');

    if (env.LOOKUP_API_TOKEN) api.token = env.LOOKUP_API_TOKEN;
    if (env.LOOKUP_PRIMARY_URL) api.primary_url = env.LOOKUP_PRIMARY_URL;
    if (env.LOOKUP_FALLBACK_URLS !== undefined) {
        api.fallback_urls = env.LOOKUP_FALLBACK_URLS.split(',').map(u => u.trim()).filter(Boolean);
    }
    if (env.LOOKUP_TIMEOUT_MS) api.timeout_ms = env.LOOKUP_TIMEOUT_MS;
    if (env.DEFAULT_COUNTRY) lookup.default_country = env.DEFAULT_COUNTRY;
    if (env.RESULTS_DIR) storage.results_dir = env.RESULTS_DIR;
    if (env.LOG_LEVEL) logging.level = env.LOG_LEVEL;
    if (env.LOG_DIR) logging.dir = env.LOG_DIR;

    return { ...raw, api, lookup, batch: section(raw, 'batch'), storage, logging };
}

function readYaml(configPath: string): Record<string, unknown> {
    let contents: string;
    try {
        contents = fs.readFileSync(configPath, 'utf8');
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigurationError(`Cannot read config file ${configPath}: ${reason}`);
    }

    let parsed: unknown;
    try {
        parsed = yaml.load(contents);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigurationError(`Config file ${configPath} is not valid YAML: ${reason}`);
    }

    if (parsed === undefined || parsed === null) return {};
    if (!isRecord(parsed)) {
        throw new ConfigurationError(`Config file ${configPath} must contain a mapping at the top level`);
    }
    return parsed;
}

/**
 * Loads the YAML config and applies environment overrides.
 * Throws ConfigurationError listing every invalid setting.
 */
export const loadConfig = (
    configPath: string = DEFAULT_CONFIG_PATH,
    env: NodeJS.ProcessEnv = process.env
): AppConfig => {
    const overrides = EnvSchema.parse(env);
    const raw = applyEnv(readYaml(configPath), overrides);
    const result = ConfigSchema.safeParse(raw);

    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid configuration in ${configPath}`, issues);
    }
    return result.data;
};

/**
 * Reads `.env` from the working directory into process.env (existing variables win).
 */
export const loadDotenv = (): void => {
    dotenv.config();
};

/** Copy of the config that is safe to print. */
export const redactConfig = (config: AppConfig): AppConfig => ({
    ...config,
    api: { ...config.api, token: config.api.token ? '***' : undefined },
});

export const saveConfig = (config: AppConfig, targetPath: string): void => {
    const { token: _token, ...api } = config.api;
    const contents = yaml.dump({ ...config, api }, { lineWidth: 120, skipInvalid: true });
    fs.mkdirSync(path.dirname(targetPath), { recursive: true });
    fs.writeFileSync(targetPath, contents, 'utf8');
};

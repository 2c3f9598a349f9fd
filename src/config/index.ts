import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { LOG_LEVELS } from '../modules/observability';
import { ConfigurationError, errorMessage } from '../utils/errors';

export const DEFAULT_CONFIG_PATH = path.join(__dirname, '../../config/default.yaml');

/**
 * 📋 CONFIG SCHEMA
 * Every key has a default, so an empty document is a valid config.
 */
const ConfigSchema = z.object({
    codice_fiscale: z.object({
        minimum_age: z.coerce.number().int().min(0).max(150).default(18),
        require_minimum_age: z.boolean().default(false),
    }).default({}),
    municipality: z.object({
        search_limit: z.coerce.number().int().min(1).default(20),
    }).default({}),
    logging: z.object({
        level: z.enum(LOG_LEVELS).default('warn'),
        file: z.object({
            enabled: z.boolean().default(false),
            directory: z.string().min(1).default('logs'),
            max_files: z.string().min(1).default('14d'),
        }).default({}),
    }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * LOG_LEVEL and CF_MINIMUM_AGE win over the YAML document.
 */
function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): Record<string, unknown> {
    const doc: Record<string, unknown> = isRecord(raw) ? { ...raw } : {};

    if (env.LOG_LEVEL) {
        const logging = isRecord(doc.logging) ? doc.logging : {};
        doc.logging = { ...logging, level: env.LOG_LEVEL.toLowerCase() };
    }
    if (env.CF_MINIMUM_AGE) {
        const cf = isRecord(doc.codice_fiscale) ? doc.codice_fiscale : {};
        doc.codice_fiscale = { ...cf, minimum_age: env.CF_MINIMUM_AGE };
    }
    return doc;
}

export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): Config {
    const result = ConfigSchema.safeParse(applyEnvOverrides(raw, env));
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
    }
    return result.data;
}

let configInstance: Config | null = null;

export const loadConfig = (configPath?: string): Config => {
    if (configInstance) return configInstance;

    // .env is read here, never at import time
    dotenv.config();

    const validPath = configPath || DEFAULT_CONFIG_PATH;
    let fileContents: string;
    try {
        fileContents = fs.readFileSync(validPath, 'utf8');
    } catch (e) {
        throw new ConfigurationError(`Cannot read config file ${validPath}: ${errorMessage(e)}`);
    }

    let raw: unknown;
    try {
        raw = yaml.load(fileContents);
    } catch (e) {
        throw new ConfigurationError(`Config file ${validPath} is not valid YAML: ${errorMessage(e)}`);
    }

    configInstance = parseConfig(raw);
    return configInstance;
};

export const getConfig = (): Config => {
    if (!configInstance) {
        return loadConfig(); // Auto-load default
    }
    return configInstance;
};

export const resetConfig = (): void => {
    configInstance = null;
};

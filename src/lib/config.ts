import { readFileSync } from 'fs';
import { homedir } from 'os';
import { logger } from '@src/lib/logger.js';

/**
 * Configuration file paths in order of precedence
 */
const ROWSMITH_CONFIG_PATHS = [
    './.config/rowsmith/env.json',  // Project-local configuration
    `${homedir()}/.config/rowsmith/env.json`,  // User configuration
];

export const DEFAULT_BATCH_SIZE = 50;
export const DEFAULT_FETCH_SIZE = 100;
export const DEFAULT_POOL_MAX = 10;

/**
 * RowsmithEnv - Configuration management
 *
 * Loads configuration from JSON files in order of precedence:
 * 1. ./.config/rowsmith/env.json
 * 2. ~/.config/rowsmith/env.json
 * 3. process.env (system environment variables)
 *
 * Values found in a file never override variables already present in process.env.
 */
export class RowsmithEnv {
    private static loaded = false;

    /**
     * Load configuration from the first JSON file found
     * Safe to call multiple times - only loads once
     */
    static load(): void {
        if (this.loaded) {
            return;
        }

        for (const configPath of ROWSMITH_CONFIG_PATHS) {
            const configData = readConfigFile(configPath);
            if (configData === undefined) {
                continue;
            }

            let loadedCount = 0;
            for (const [key, value] of Object.entries(configData)) {
                if (process.env[key] === undefined) {
                    process.env[key] = String(value);
                    loadedCount++;
                }
            }

            logger.debug('Loaded rowsmith configuration', { configPath, variableCount: loadedCount });
            this.loaded = true;
            return;
        }

        this.loaded = true;
    }

    /**
     * Get configuration value with required validation
     * @throws Error if required=true and key not found
     */
    static get(key: string, defaultValue?: string, required: boolean = false): string {
        this.load();

        const value = process.env[key] || defaultValue;

        if (required && !value) {
            throw new Error(
                `${key} not found in configuration. ` +
                `Set it in the environment or in .config/rowsmith/env.json.`
            );
        }

        return value || '';
    }

    /**
     * Get a positive integer setting, falling back to the default on absent or invalid values
     */
    static getInt(key: string, defaultValue: number): number {
        const raw = this.get(key);
        if (!raw) {
            return defaultValue;
        }

        const parsed = Number.parseInt(raw, 10);
        if (!Number.isInteger(parsed) || parsed <= 0) {
            logger.warn('Ignoring invalid integer configuration', { key, value: raw });
            return defaultValue;
        }

        return parsed;
    }

    static getBool(key: string, defaultValue: boolean = false): boolean {
        const raw = this.get(key).toLowerCase();
        if (!raw) {
            return defaultValue;
        }
        return raw === 'true' || raw === '1' || raw === 'yes';
    }

    static databaseUrl(): string {
        return this.get('DATABASE_URL', undefined, true);
    }

    static poolMax(): number {
        return this.getInt('ROWSMITH_POOL_MAX', DEFAULT_POOL_MAX);
    }

    static batchSize(): number {
        return this.getInt('ROWSMITH_BATCH_SIZE', DEFAULT_BATCH_SIZE);
    }

    static fetchSize(): number {
        return this.getInt('ROWSMITH_FETCH_SIZE', DEFAULT_FETCH_SIZE);
    }

    static debug(): boolean {
        return this.getBool('ROWSMITH_DEBUG');
    }

    /**
     * Forget the loaded state so the next access reads the files again
     */
    static reset(): void {
        this.loaded = false;
    }
}

function readConfigFile(configPath: string): Record<string, unknown> | undefined {
    let text: string;
    try {
        text = readFileSync(configPath, 'utf8');
    } catch {
        return undefined; // Missing file: try the next path
    }

    const parsed: unknown = JSON.parse(text);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        logger.warn('Invalid rowsmith configuration - not an object', { configPath });
        return undefined;
    }

    return Object.fromEntries(Object.entries(parsed));
}

/**
 * @file Config Loader
 *
 * Reads the YAML config file and validates it. A missing file is normal;
 * an unreadable or malformed one degrades to the empty config with the
 * reason attached, so startup never stops on configuration.
 *
 * @module config/loader
 */

import fs from 'fs';
import yaml from 'js-yaml';
import { EMPTY_CONFIG, ShellConfigSchema, type ShellConfig } from './schemas.js';

export interface ConfigLoadResult {
    config: ShellConfig;
    source: 'file' | 'default';
    error: string | null;
}

/**
 * Parse config text. Exposed separately so tests need no files.
 */
export function config_parse(text: string): { ok: true; config: ShellConfig } | { ok: false; error: string } {
    let raw: unknown;
    try {
        raw = yaml.load(text);
    } catch (e: unknown) {
        return { ok: false, error: `YAML error: ${e instanceof Error ? e.message : String(e)}` };
    }

    // An empty document is a valid, empty config.
    const parsed = ShellConfigSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        const issues: string = parsed.error.issues
            .map((i): string => `${i.path.join('.') || '<root>'}: ${i.message}`)
            .join(', ');
        return { ok: false, error: `Invalid config: ${issues}` };
    }
    return { ok: true, config: parsed.data };
}

/**
 * Load the config file at `filePath`.
 */
export function config_load(filePath: string): ConfigLoadResult {
    if (!fs.existsSync(filePath)) {
        return { config: EMPTY_CONFIG, source: 'default', error: null };
    }

    let text: string;
    try {
        text = fs.readFileSync(filePath, 'utf-8');
    } catch (e: unknown) {
        const reason: string = e instanceof Error ? e.message : String(e);
        return { config: EMPTY_CONFIG, source: 'default', error: `Cannot read ${filePath}: ${reason}` };
    }

    const result = config_parse(text);
    if (!result.ok) {
        return { config: EMPTY_CONFIG, source: 'default', error: `${filePath}: ${result.error}` };
    }
    return { config: result.config, source: 'file', error: null };
}

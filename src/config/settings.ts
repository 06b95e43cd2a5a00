/**
 * @file Shell Settings Service
 *
 * Read-only settings lookups with central validation and deterministic
 * precedence (per-user key > env > config file > defaults).
 *
 * Bad values never abort startup: they are logged and replaced by the
 * default for that key.
 *
 * @module
 */

import { EMPTY_CONFIG, type LauncherSection, type ShellConfig } from './schemas.js';

export type SettingSource = 'user' | 'env' | 'file' | 'default';

export type BackgroundType = 'scale' | 'scale-crop' | 'tile' | 'none';

export interface BackgroundSettings {
    image: string;
    color: number;
    type: BackgroundType;
}

export interface LauncherSpec {
    icon: string;
    path: string;
}

export type EnvSource = Record<string, string | undefined>;

const DEFAULT_DATA_DIR: string = '/usr/share/desktop-shell';
const DEFAULT_TERMINAL: string = '/usr/bin/x-terminal-emulator';
const DEFAULT_PANEL_COLOR: number = 0xaa000000;
const COLOR_MAX: number = 0xffffffff;

export class ShellSettings {
    private readonly config: ShellConfig;
    private readonly env: EnvSource;

    constructor(config: ShellConfig = EMPTY_CONFIG, env: EnvSource = process.env) {
        this.config = config;
        this.env = env;
    }

    /**
     * Whether prepare-lock shows the unlock dialog. Defaults to true.
     */
    public locking_resolve(): boolean {
        const envValue: boolean | undefined = this.envBoolean_resolve('DESKTOP_SHELL_LOCKING');
        if (envValue !== undefined) return envValue;
        return this.config.shell.locking ?? true;
    }

    public locking_source(): SettingSource {
        if (this.envBoolean_resolve('DESKTOP_SHELL_LOCKING') !== undefined) return 'env';
        if (this.config.shell.locking !== undefined) return 'file';
        return 'default';
    }

    public panelColor_resolve(): number {
        const envRaw: string | undefined = this.env['DESKTOP_SHELL_PANEL_COLOR'];
        if (envRaw) {
            const parsed: number | null = color_parse(envRaw);
            if (parsed !== null) return parsed;
            console.warn(`[settings] invalid DESKTOP_SHELL_PANEL_COLOR "${envRaw}", ignoring`);
        }

        const fileValue: string | number | undefined = this.config.shell['panel-color'];
        if (fileValue !== undefined) {
            const parsed: number | null = color_parse(fileValue);
            if (parsed !== null) return parsed;
            console.warn(`[settings] invalid panel-color "${String(fileValue)}", using default`);
        }
        return DEFAULT_PANEL_COLOR;
    }

    public dataDir_resolve(): string {
        const envValue: string | undefined = this.env['DESKTOP_SHELL_DATADIR'];
        if (envValue) return envValue;
        return this.config.shell['data-dir'] ?? DEFAULT_DATA_DIR;
    }

    /**
     * Resolve background image, colour and fill type for one user.
     */
    public background_resolve(username: string): BackgroundSettings {
        const pattern: string = `${this.dataDir_resolve()}/pattern.png`;

        let image: string = this.string_get(`background-image-${username}`) ?? pattern;
        if (image === pattern) {
            image = this.string_get('background-image') ?? pattern;
        }

        let color: number = this.color_get(`background-color-${username}`) ?? 0;
        if (color === 0) {
            color = this.color_get('background-color') ?? 0;
        }

        return { image, color, type: this.backgroundType_resolve() };
    }

    public background_source(username: string): SettingSource {
        if (this.string_get(`background-image-${username}`) !== undefined) return 'user';
        if (this.string_get('background-image') !== undefined) return 'file';
        return 'default';
    }

    /**
     * Launchers for one user's panel: every generic launcher section plus the
     * sections scoped to that user. Sections missing `icon` or `path` are
     * logged and skipped; with no valid section a terminal launcher is used.
     */
    public launchers_resolve(username: string): LauncherSpec[] {
        const specs: LauncherSpec[] = [];
        this.config.launchers
            .filter((s: LauncherSection): boolean => s.user === undefined || s.user === username)
            .forEach((s: LauncherSection): void => {
                if (s.icon !== undefined && s.path !== undefined) {
                    specs.push({ icon: s.icon, path: s.path });
                } else {
                    console.warn('[settings] invalid launcher section: icon and path are required');
                }
            });

        if (specs.length === 0) {
            specs.push({ icon: `${this.dataDir_resolve()}/terminal.png`, path: DEFAULT_TERMINAL });
        }
        return specs;
    }

    private backgroundType_resolve(): BackgroundType {
        const raw: string = this.string_get('background-type') ?? 'tile';
        switch (raw) {
            case 'scale':
            case 'scale-crop':
            case 'tile':
                return raw;
            default:
                console.warn(`[settings] invalid background-type: ${raw}`);
                return 'none';
        }
    }

    private string_get(key: string): string | undefined {
        const value: string | number | boolean | undefined = this.config.shell[key];
        return typeof value === 'string' ? value : undefined;
    }

    private color_get(key: string): number | undefined {
        const value: string | number | boolean | undefined = this.config.shell[key];
        if (value === undefined || typeof value === 'boolean') return undefined;
        const parsed: number | null = color_parse(value);
        if (parsed === null) {
            console.warn(`[settings] invalid ${key} "${String(value)}", ignoring`);
            return undefined;
        }
        return parsed;
    }

    private envBoolean_resolve(key: string): boolean | undefined {
        const raw: string | undefined = this.env[key];
        if (!raw) return undefined;
        const normalized: string = raw.trim().toLowerCase();
        if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
        if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
        return undefined;
    }
}

/**
 * Parse an ARGB colour. Strings accept a `0x` hex or a decimal form.
 *
 * @returns The colour, or null when out of range or unparseable.
 */
export function color_parse(value: string | number): number | null {
    let parsed: number;
    if (typeof value === 'number') {
        parsed = value;
    } else {
        const trimmed: string = value.trim();
        if (/^0x[0-9a-f]+$/i.test(trimmed)) {
            parsed = Number.parseInt(trimmed.slice(2), 16);
        } else if (/^[0-9]+$/.test(trimmed)) {
            parsed = Number.parseInt(trimmed, 10);
        } else {
            return null;
        }
    }
    if (!Number.isInteger(parsed) || parsed < 0 || parsed > COLOR_MAX) return null;
    return parsed;
}

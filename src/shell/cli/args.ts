/**
 * @file CLI Arguments
 *
 * Flag parsing shared by the shell entry points.
 *
 * @module shell/cli/args
 */

import os from 'os';
import path from 'path';

export interface ShellCliOptions {
    url?: string;
    config: string;
    user?: string;
}

/** `$XDG_CONFIG_HOME/desktop-shell.yaml`, falling back to `~/.config`. */
export function configPath_default(env: Record<string, string | undefined> = process.env): string {
    const base: string = env['XDG_CONFIG_HOME'] || path.join(os.homedir(), '.config');
    return path.join(base, 'desktop-shell.yaml');
}

/**
 * Parse `--url <ws-url>`, `--config <file>` and `--user <name>`.
 * Unknown flags and flags missing their value are skipped.
 */
export function shellArgs_parse(
    args: readonly string[],
    env: Record<string, string | undefined> = process.env
): ShellCliOptions {
    const options: ShellCliOptions = { config: env['DESKTOP_SHELL_CONFIG'] || configPath_default(env) };

    for (let i = 0; i < args.length; i++) {
        const value: string | undefined = args[i + 1];
        if (args[i] === '--url' && value) {
            options.url = value;
            i++;
        } else if (args[i] === '--config' && value) {
            options.config = value;
            i++;
        } else if (args[i] === '--user' && value) {
            options.user = value;
            i++;
        }
    }
    return options;
}

/**
 * @file Panel Launcher
 *
 * Launcher buttons on the panel. A launcher's `path` is a small command
 * line: leading `NAME=value` words set environment variables for the child,
 * the remaining words are its argv.
 *
 * @module desktop/panel/launcher
 */

import type { CursorKind, Rectangle, WidgetHandle } from '../../toolkit/types.js';
import type { EnvSource, LauncherSpec } from '../../config/settings.js';
import type { LaunchCommand, ProcessLauncher } from './ProcessLauncher.js';

/** Launcher icons are drawn at this size when the image is unavailable. */
export const LAUNCHER_ICON_SIZE: number = 20;

/**
 * Split a launcher command line into argv and the child's environment.
 *
 * @param path - Whitespace-separated command line.
 * @param baseEnv - Environment inherited by the child.
 */
export function launcherCommand_parse(path: string, baseEnv: EnvSource): LaunchCommand {
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(baseEnv)) {
        if (value !== undefined) env[key] = value;
    }

    const argv: string[] = [];
    for (const word of path.trim().split(/\s+/)) {
        if (!word) continue;
        const eq: number = word.indexOf('=');
        if (eq > 0 && argv.length === 0) {
            env[word.slice(0, eq)] = word.slice(eq + 1);
        } else {
            argv.push(word);
        }
    }
    return { argv, env };
}

/**
 * One launcher button.
 */
export class PanelLauncher {
    public readonly widget: WidgetHandle;
    public focused: boolean = false;
    public pressed: boolean = false;

    constructor(
        parent: WidgetHandle,
        public readonly spec: LauncherSpec,
        public readonly command: LaunchCommand,
        private readonly processLauncher: ProcessLauncher
    ) {
        this.widget = parent.child_add({
            enter: (): CursorKind => {
                this.focused = true;
                this.widget.redraw_schedule();
                return 'left_ptr';
            },
            leave: (): void => {
                this.focused = false;
                this.widget.redraw_schedule();
            },
            button: (_button, state): void => {
                this.pressed = state === 'pressed';
                this.widget.redraw_schedule();
                if (state === 'released') this.activate();
            },
            touchDown: (): void => {
                this.focused = true;
                this.widget.redraw_schedule();
            },
            touchUp: (): void => {
                this.focused = false;
                this.widget.redraw_schedule();
                this.activate();
            }
        });
    }

    public activate(): void {
        this.processLauncher.launch(this.command);
    }

    public allocation_place(x: number, centerY: number): Rectangle {
        const size: number = LAUNCHER_ICON_SIZE;
        const rect: Rectangle = { x, y: centerY - size / 2, width: size + 1, height: size + 1 };
        this.widget.allocation_set(rect);
        return rect;
    }

    public destroy(): void {
        this.widget.destroy();
    }
}

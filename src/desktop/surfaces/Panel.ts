/**
 * @file Panel Surface
 *
 * The status panel half of a surface pair: launchers on the left, clock
 * and user switcher on the right. Always 32px tall, whatever height the
 * compositor asks for.
 *
 * @module desktop/surfaces/Panel
 */

import type { WidgetHandle, WindowHandle } from '../../toolkit/types.js';
import type { ConfigurableSurface } from '../types.js';
import type { ChromeContext } from './ChromeContext.js';
import { Events } from '../../core/state/events.js';
import { launcherCommand_parse, PanelLauncher, LAUNCHER_ICON_SIZE } from '../panel/launcher.js';
import { PanelClock } from '../panel/clock.js';
import { PanelSwitcher } from '../panel/switcher.js';
import type { LauncherSpec } from '../../config/settings.js';

export const PANEL_HEIGHT: number = 32;

const CLOCK_WIDTH: number = 170;
const ROW_HEIGHT: number = 20;

export class Panel implements ConfigurableSurface {
    public readonly role = 'panel' as const;
    public painted: boolean = false;
    public readonly color: number;
    public readonly launchers: PanelLauncher[];
    public readonly clock: PanelClock;
    public readonly switcher: PanelSwitcher;
    private readonly widget: WidgetHandle;

    /**
     * Build a panel for one user on one output.
     *
     * @returns The panel, or null when the toolkit has no window to give.
     */
    public static create(ctx: ChromeContext, outputId: number, username: string): Panel | null {
        const window: WindowHandle | null = ctx.toolkit.window_create('panel');
        if (!window) return null;
        return new Panel(ctx, window, outputId, username);
    }

    private constructor(
        private readonly ctx: ChromeContext,
        public readonly window: WindowHandle,
        public readonly outputId: number,
        public readonly username: string
    ) {
        this.color = ctx.settings.panelColor_resolve();
        this.widget = window.widget_add({
            resize: (width: number, height: number): void => this.resize_handle(width, height),
            redraw: (): void => this.redraw_handle()
        });

        this.clock = new PanelClock(this.widget, ctx.toolkit, ctx.now);
        this.switcher = new PanelSwitcher(this.widget, window, ctx.toolkit, username, (): void => {
            ctx.events.emit(Events.LOCK_REQUESTED, { username });
        });
        this.launchers = ctx.settings.launchers_resolve(username).map(
            (spec: LauncherSpec): PanelLauncher => new PanelLauncher(
                this.widget,
                spec,
                launcherCommand_parse(spec.path, ctx.env),
                ctx.processLauncher
            )
        );
    }

    public configure(_edges: number, width: number, _height: number): void {
        this.window.resize_schedule(width, PANEL_HEIGHT);
    }

    public destroy(): void {
        this.clock.destroy();
        this.switcher.destroy();
        this.launchers.forEach((launcher: PanelLauncher): void => launcher.destroy());
        this.widget.destroy();
        this.window.destroy();
    }

    private resize_handle(width: number, _height: number): void {
        this.painted = false;

        const centerY: number = PANEL_HEIGHT / 2;
        let x: number = 10;
        for (const launcher of this.launchers) {
            launcher.allocation_place(x, centerY);
            x += LAUNCHER_ICON_SIZE + 10;
        }

        const top: number = centerY - ROW_HEIGHT / 2;
        const switcherWidth: number = this.switcher.width_measure();
        this.switcher.widget.allocation_set({
            x: width - switcherWidth, y: top, width: switcherWidth + 1, height: ROW_HEIGHT + 1
        });
        this.clock.widget.allocation_set({
            x: width - switcherWidth - CLOCK_WIDTH - 8, y: top, width: CLOCK_WIDTH + 1, height: ROW_HEIGHT + 1
        });
    }

    private redraw_handle(): void {
        this.painted = true;
        this.ctx.events.emit(Events.SURFACE_PAINTED, {
            outputId: this.outputId,
            username: this.username,
            role: this.role
        });
    }
}

/**
 * @file Background Surface
 *
 * The background half of a surface pair. Takes whatever size the
 * compositor configures.
 *
 * @module desktop/surfaces/Background
 */

import type { WidgetHandle, WindowHandle } from '../../toolkit/types.js';
import type { BackgroundSettings, BackgroundType } from '../../config/settings.js';
import type { ConfigurableSurface } from '../types.js';
import type { ChromeContext } from './ChromeContext.js';
import { Events } from '../../core/state/events.js';

/** What the renderer paints: the image in a fill mode, or a flat colour. */
export type BackgroundFill =
    | { kind: 'image'; image: string; mode: Exclude<BackgroundType, 'none'> }
    | { kind: 'color'; color: number };

export class Background implements ConfigurableSurface {
    public readonly role = 'background' as const;
    public painted: boolean = false;
    public readonly settings: BackgroundSettings;
    private readonly widget: WidgetHandle;

    public static create(ctx: ChromeContext, outputId: number, username: string): Background | null {
        const window: WindowHandle | null = ctx.toolkit.window_create('background');
        if (!window) return null;
        return new Background(ctx, window, outputId, username);
    }

    private constructor(
        private readonly ctx: ChromeContext,
        public readonly window: WindowHandle,
        public readonly outputId: number,
        public readonly username: string
    ) {
        this.settings = ctx.settings.background_resolve(username);
        this.widget = window.widget_add({
            resize: (): void => {
                this.painted = false;
            },
            redraw: (): void => this.redraw_handle()
        });
    }

    public configure(_edges: number, width: number, height: number): void {
        this.window.resize_schedule(width, height);
    }

    public fill_resolve(): BackgroundFill {
        const { image, color, type } = this.settings;
        if (type === 'none') return { kind: 'color', color };
        return { kind: 'image', image, mode: type };
    }

    public destroy(): void {
        this.widget.destroy();
        this.window.destroy();
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

/**
 * @file Headless Toolkit
 *
 * In-process Toolkit implementation that keeps window and widget state in
 * memory instead of drawing. Used by the CLI (event-loop scheduling) and by
 * every test (manual scheduling, so a test decides when frames paint and
 * when deferred tasks run).
 *
 * @module toolkit/HeadlessToolkit
 */

import type {
    ButtonState,
    CursorKind,
    KeyHandler,
    KeySym,
    KeyState,
    PointerButton,
    Rectangle,
    SurfaceId,
    TimerStop,
    Toolkit,
    WidgetHandle,
    WidgetHandlers,
    WindowHandle
} from './types.js';

export type HeadlessScheduling = 'manual' | 'event-loop';

export interface HeadlessToolkitOptions {
    scheduling?: HeadlessScheduling;
    /** First surface id handed out. */
    surfaceBase?: number;
}

export interface HeadlessMenu {
    window: WindowHandle;
    entries: readonly string[];
    select: (index: number) => void;
}

interface HeadlessTimer {
    intervalMs: number;
    tick: () => void;
    stopped: boolean;
}

/**
 * Widget kept in memory. Input helpers (`button_send`, `touchUp_send`, ...)
 * let tests play the role of the pointer.
 */
export class HeadlessWidget implements WidgetHandle {
    public readonly children: HeadlessWidget[] = [];
    public redrawPending: boolean = false;
    public destroyed: boolean = false;
    private allocation: Rectangle = { x: 0, y: 0, width: 0, height: 0 };

    constructor(
        public readonly window: HeadlessWindow,
        public readonly handlers: WidgetHandlers
    ) {}

    public child_add(handlers: WidgetHandlers): WidgetHandle {
        const child: HeadlessWidget = new HeadlessWidget(this.window, handlers);
        this.children.push(child);
        this.window.frame_request();
        return child;
    }

    public allocation_set(rect: Rectangle): void {
        this.allocation = { ...rect };
    }

    public allocation_get(): Rectangle {
        return { ...this.allocation };
    }

    public redraw_schedule(): void {
        if (this.destroyed) return;
        this.redrawPending = true;
        this.window.frame_request();
    }

    public destroy(): void {
        this.destroyed = true;
        for (const child of this.children) child.destroy();
    }

    /** Every live widget in this subtree, parent before children. */
    public subtree_list(): HeadlessWidget[] {
        if (this.destroyed) return [];
        const out: HeadlessWidget[] = [this];
        for (const child of this.children) out.push(...child.subtree_list());
        return out;
    }

    public enter_send(): CursorKind | null {
        if (this.destroyed || !this.handlers.enter) return null;
        return this.handlers.enter();
    }

    public leave_send(): void {
        if (this.destroyed) return;
        this.handlers.leave?.();
    }

    public button_send(button: PointerButton, state: ButtonState): void {
        if (this.destroyed) return;
        this.handlers.button?.(button, state);
    }

    public touchDown_send(): void {
        if (this.destroyed) return;
        this.handlers.touchDown?.();
    }

    public touchUp_send(): void {
        if (this.destroyed) return;
        this.handlers.touchUp?.();
    }
}

/**
 * Window kept in memory. A scheduled resize is applied on the next frame,
 * followed by a redraw of every widget in the window.
 */
export class HeadlessWindow implements WindowHandle {
    public readonly widgets: HeadlessWidget[] = [];
    public pendingSize: { width: number; height: number } | null = null;
    public size: { width: number; height: number } = { width: 0, height: 0 };
    public bufferTransform: number = 0;
    public bufferScale: number = 1;
    public destroyed: boolean = false;
    private keyHandler: KeyHandler | null = null;

    constructor(
        private readonly toolkit: HeadlessToolkit,
        public readonly surfaceId: SurfaceId,
        public readonly title: string
    ) {}

    public widget_add(handlers: WidgetHandlers): WidgetHandle {
        const widget: HeadlessWidget = new HeadlessWidget(this, handlers);
        this.widgets.push(widget);
        return widget;
    }

    public keyHandler_set(handler: KeyHandler): void {
        this.keyHandler = handler;
    }

    public resize_schedule(width: number, height: number): void {
        if (this.destroyed) return;
        this.pendingSize = { width, height };
        this.frame_request();
    }

    public bufferTransform_set(transform: number): void {
        this.bufferTransform = transform;
    }

    public bufferScale_set(scale: number): void {
        this.bufferScale = scale;
    }

    public destroy(): void {
        if (this.destroyed) return;
        this.destroyed = true;
        for (const widget of this.widgets) widget.destroy();
        this.toolkit.window_forget(this);
    }

    public key_send(key: KeySym, state: KeyState = 'pressed'): void {
        if (this.destroyed || !this.keyHandler) return;
        this.keyHandler(key, state);
    }

    /** @internal */
    public frame_request(): void {
        this.toolkit.frame_request();
    }

    /**
     * Apply a pending resize and run pending redraws.
     *
     * @returns True if any handler ran.
     */
    public frame_dispatch(): boolean {
        if (this.destroyed) return false;
        let worked: boolean = false;
        const root: HeadlessWidget | undefined = this.widgets[0];

        if (this.pendingSize) {
            this.size = this.pendingSize;
            this.pendingSize = null;
            worked = true;
            if (root && !root.destroyed) {
                root.allocation_set({ x: 0, y: 0, width: this.size.width, height: this.size.height });
                root.handlers.resize?.(this.size.width, this.size.height);
            }
            for (const widget of this.widgets_list()) widget.redrawPending = true;
        }

        for (const widget of this.widgets_list()) {
            if (!widget.redrawPending) continue;
            widget.redrawPending = false;
            worked = true;
            widget.handlers.redraw?.();
        }
        return worked;
    }

    public widgets_list(): HeadlessWidget[] {
        return this.widgets.flatMap((w: HeadlessWidget): HeadlessWidget[] => w.subtree_list());
    }
}

/**
 * Toolkit that records instead of rendering.
 */
export class HeadlessToolkit implements Toolkit {
    public readonly menus: HeadlessMenu[] = [];
    public windowsCreated: number = 0;
    private readonly scheduling: HeadlessScheduling;
    private readonly windows: Map<SurfaceId, HeadlessWindow> = new Map();
    private readonly timers: HeadlessTimer[] = [];
    private tasks: Array<() => void> = [];
    private nextSurface: number;
    private allocationFailures: number = 0;
    private frameQueued: boolean = false;

    constructor(options: HeadlessToolkitOptions = {}) {
        this.scheduling = options.scheduling ?? 'manual';
        this.nextSurface = options.surfaceBase ?? 100;
    }

    public window_create(title: string): HeadlessWindow | null {
        if (this.allocationFailures > 0) {
            this.allocationFailures -= 1;
            return null;
        }
        const window: HeadlessWindow = new HeadlessWindow(this, this.nextSurface++, title);
        this.windows.set(window.surfaceId, window);
        this.windowsCreated += 1;
        return window;
    }

    public task_defer(task: () => void): void {
        if (this.scheduling === 'event-loop') {
            setImmediate(task);
            return;
        }
        this.tasks.push(task);
    }

    public timer_start(intervalMs: number, tick: () => void): TimerStop {
        if (this.scheduling === 'event-loop') {
            const handle: NodeJS.Timeout = setInterval(tick, intervalMs);
            handle.unref();
            return (): void => clearInterval(handle);
        }
        const timer: HeadlessTimer = { intervalMs, tick, stopped: false };
        this.timers.push(timer);
        return (): void => {
            timer.stopped = true;
        };
    }

    public menu_show(window: WindowHandle, entries: readonly string[], select: (index: number) => void): void {
        this.menus.push({ window, entries, select });
    }

    // ─── Test / replay controls ─────────────────────────────────────────

    /** Make the next `count` window allocations fail. */
    public allocationFailures_inject(count: number): void {
        this.allocationFailures = count;
    }

    /**
     * Run the tasks queued so far. Tasks queued while running wait for the
     * next call, as they would wait for the next event-loop turn.
     *
     * @returns Number of tasks run.
     */
    public tasks_run(): number {
        const batch: Array<() => void> = this.tasks;
        this.tasks = [];
        for (const task of batch) task();
        return batch.length;
    }

    public tasks_pending(): number {
        return this.tasks.length;
    }

    /** Fire every live manual timer once. */
    public timers_fire(): number {
        const live: HeadlessTimer[] = this.timers.filter((t: HeadlessTimer): boolean => !t.stopped);
        for (const timer of live) timer.tick();
        return live.length;
    }

    public timers_live(): number {
        return this.timers.filter((t: HeadlessTimer): boolean => !t.stopped).length;
    }

    /**
     * Dispatch frames on every live window until nothing is pending.
     *
     * @returns Number of windows that did work in the first pass.
     */
    public frames_dispatch(): number {
        this.frameQueued = false;
        let first: number = 0;
        let pass: number = 0;
        let worked: boolean = true;
        while (worked && pass < 8) {
            worked = false;
            for (const window of [...this.windows.values()]) {
                if (window.frame_dispatch()) {
                    worked = true;
                    if (pass === 0) first += 1;
                }
            }
            pass += 1;
        }
        return first;
    }

    public window_get(surfaceId: SurfaceId): HeadlessWindow | undefined {
        return this.windows.get(surfaceId);
    }

    public windows_list(): HeadlessWindow[] {
        return [...this.windows.values()];
    }

    /** @internal */
    public window_forget(window: HeadlessWindow): void {
        this.windows.delete(window.surfaceId);
    }

    /** @internal */
    public frame_request(): void {
        if (this.scheduling !== 'event-loop' || this.frameQueued) return;
        this.frameQueued = true;
        setImmediate((): void => {
            this.frames_dispatch();
        });
    }
}

/**
 * @file Toolkit Seam Types
 *
 * The windowing/widget toolkit is an external collaborator. The shell core
 * talks to it only through these interfaces: it creates windows and widgets,
 * schedules resizes and redraws, and receives input callbacks. Pixels are
 * never drawn here.
 *
 * @module toolkit/types
 */

/** Compositor-visible surface identity of a window. */
export type SurfaceId = number;

export interface Rectangle {
    x: number;
    y: number;
    width: number;
    height: number;
}

/** Local cursor images the toolkit can show. */
export type CursorKind =
    | 'blank'
    | 'watch'
    | 'dragging'
    | 'top'
    | 'bottom'
    | 'left'
    | 'right'
    | 'top_left'
    | 'top_right'
    | 'bottom_left'
    | 'bottom_right'
    | 'left_ptr';

export type PointerButton = 'left' | 'middle' | 'right';

export type ButtonState = 'pressed' | 'released';

export type KeyState = 'pressed' | 'released';

/** Named keys the shell reacts to; everything else arrives as translated text. */
export type NamedKey = 'Escape' | 'Return' | 'KP_Enter' | 'BackSpace' | 'Delete' | 'Left' | 'Right' | 'Tab';

export type KeySym =
    | { name: NamedKey }
    | { name: 'char'; text: string };

export type KeyHandler = (key: KeySym, state: KeyState) => void;

/**
 * Callbacks a widget may register. Every one is optional.
 */
export interface WidgetHandlers {
    resize?: (width: number, height: number) => void;
    redraw?: () => void;
    enter?: () => CursorKind;
    leave?: () => void;
    button?: (button: PointerButton, state: ButtonState) => void;
    touchDown?: () => void;
    touchUp?: () => void;
}

export interface WidgetHandle {
    child_add(handlers: WidgetHandlers): WidgetHandle;
    allocation_set(rect: Rectangle): void;
    allocation_get(): Rectangle;
    redraw_schedule(): void;
    destroy(): void;
}

export interface WindowHandle {
    readonly surfaceId: SurfaceId;
    /** Root widget of the window; the first one added receives resizes. */
    widget_add(handlers: WidgetHandlers): WidgetHandle;
    keyHandler_set(handler: KeyHandler): void;
    resize_schedule(width: number, height: number): void;
    bufferTransform_set(transform: number): void;
    bufferScale_set(scale: number): void;
    destroy(): void;
}

/** Stops a repeating timer. */
export type TimerStop = () => void;

export interface Toolkit {
    /**
     * Create a toolkit window.
     *
     * @returns The window, or null when the toolkit cannot allocate one.
     */
    window_create(title: string): WindowHandle | null;
    /** Run `task` on a later turn of the event loop. */
    task_defer(task: () => void): void;
    timer_start(intervalMs: number, tick: () => void): TimerStop;
    menu_show(window: WindowHandle, entries: readonly string[], select: (index: number) => void): void;
}

/**
 * @file Shell Protocol Types
 *
 * Typed definitions for both directions of the shell protocol:
 * events the compositor sends to this client, and the requests this
 * client issues back.
 *
 * @module
 */

import type { SurfaceId } from '../../toolkit/types.js';

/** Global interface names announced by the compositor. */
export const SHELL_INTERFACE = 'desktop_shell';
export const OUTPUT_INTERFACE = 'wl_output';

/** Highest shell protocol version this client speaks. */
export const SHELL_VERSION_MAX = 2;

/** Cursor values carried by the grab-cursor event. */
export const ShellCursor = {
    NONE: 0,
    RESIZE_TOP: 1,
    RESIZE_BOTTOM: 2,
    ARROW: 3,
    RESIZE_LEFT: 4,
    RESIZE_TOP_LEFT: 5,
    RESIZE_BOTTOM_LEFT: 6,
    MOVE: 7,
    RESIZE_RIGHT: 8,
    RESIZE_TOP_RIGHT: 9,
    RESIZE_BOTTOM_RIGHT: 10,
    BUSY: 11
} as const;

// ─── Compositor → Client ────────────────────────────────────────────────────

export interface GlobalAddedEvent {
    type: 'global-added';
    interface: string;
    id: number;
    version: number;
}

export interface GlobalRemovedEvent {
    type: 'global-removed';
    interface: string;
    id: number;
}

export interface ConfigureEvent {
    type: 'configure';
    surface: SurfaceId;
    edges: number;
    width: number;
    height: number;
}

export interface PrepareLockEvent {
    type: 'prepare-lock';
}

export interface GrabCursorEvent {
    type: 'grab-cursor';
    cursor: number;
}

export interface UserSwitchedEvent {
    type: 'user-switched';
    username: string;
}

export interface OutputGeometryEvent {
    type: 'output-geometry';
    output: number;
    transform: number;
}

export interface OutputScaleEvent {
    type: 'output-scale';
    output: number;
    scale: number;
}

export type ShellEvent =
    | GlobalAddedEvent
    | GlobalRemovedEvent
    | ConfigureEvent
    | PrepareLockEvent
    | GrabCursorEvent
    | UserSwitchedEvent
    | OutputGeometryEvent
    | OutputScaleEvent;

// ─── Client → Compositor ────────────────────────────────────────────────────

export type ShellRequest =
    | { request: 'set_panel'; output: number; surface: SurfaceId }
    | { request: 'set_background'; output: number; surface: SurfaceId }
    | { request: 'set_lock_surface'; surface: SurfaceId }
    | { request: 'set_grab_surface'; surface: SurfaceId }
    | { request: 'lock' }
    | { request: 'unlock' }
    | { request: 'switch_user'; username: string }
    | { request: 'desktop_ready' };

/**
 * Outbound half of a bound shell global.
 */
export interface ShellProtocol {
    panel_set(output: number, surface: SurfaceId): void;
    background_set(output: number, surface: SurfaceId): void;
    lockSurface_set(surface: SurfaceId): void;
    grabSurface_set(surface: SurfaceId): void;
    lock(): void;
    unlock(): void;
    user_switch(username: string): void;
    desktop_ready(): void;
}

/**
 * Binds the shell global once the compositor announces it.
 * Implemented by whatever carries requests to the compositor.
 */
export interface ShellConnector {
    shell_bind(globalId: number, version: number): ShellProtocol;
}

/**
 * ShellProtocol that turns every call into a ShellRequest value and hands
 * it to a sink. The bridge sink serializes it; tests and replay record it.
 */
export class RequestShellProtocol implements ShellProtocol {
    constructor(private readonly sink: (request: ShellRequest) => void) {}

    panel_set(output: number, surface: SurfaceId): void {
        this.sink({ request: 'set_panel', output, surface });
    }

    background_set(output: number, surface: SurfaceId): void {
        this.sink({ request: 'set_background', output, surface });
    }

    lockSurface_set(surface: SurfaceId): void {
        this.sink({ request: 'set_lock_surface', surface });
    }

    grabSurface_set(surface: SurfaceId): void {
        this.sink({ request: 'set_grab_surface', surface });
    }

    lock(): void {
        this.sink({ request: 'lock' });
    }

    unlock(): void {
        this.sink({ request: 'unlock' });
    }

    user_switch(username: string): void {
        this.sink({ request: 'switch_user', username });
    }

    desktop_ready(): void {
        this.sink({ request: 'desktop_ready' });
    }
}

/**
 * Connector whose bound shell records every request in memory.
 */
export class RecordingShellConnector implements ShellConnector {
    public readonly requests: ShellRequest[] = [];
    public readonly binds: Array<{ globalId: number; version: number }> = [];

    shell_bind(globalId: number, version: number): ShellProtocol {
        this.binds.push({ globalId, version });
        return new RequestShellProtocol((request: ShellRequest): void => {
            this.requests.push(request);
        });
    }

    /** Requests of one kind, in order. */
    requests_of<R extends ShellRequest['request']>(kind: R): Extract<ShellRequest, { request: R }>[] {
        return this.requests.filter(
            (r: ShellRequest): r is Extract<ShellRequest, { request: R }> => r.request === kind
        );
    }
}

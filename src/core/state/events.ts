/**
 * @file Event Bus
 *
 * Lightweight, type-safe Event Emitter for the desktop session. Each
 * DesktopSession owns one instance; nothing here is process-global.
 *
 * @module
 */

import type { LockState, SurfaceRole } from '../../desktop/types.js';

/** All desktop event types. */
export enum Events {
    OUTPUT_ADDED = 'OUTPUT_ADDED',
    OUTPUT_REMOVED = 'OUTPUT_REMOVED',
    SURFACES_BOUND = 'SURFACES_BOUND',
    SURFACE_PAINTED = 'SURFACE_PAINTED',
    LOCK_REQUESTED = 'LOCK_REQUESTED',
    LOCK_STATE_CHANGED = 'LOCK_STATE_CHANGED',
    USER_SWITCHED = 'USER_SWITCHED',
    DESKTOP_READY = 'DESKTOP_READY'
}

/** Maps each event type to its payload type. */
export interface EventPayloads {
    [Events.OUTPUT_ADDED]: { outputId: number };
    [Events.OUTPUT_REMOVED]: { outputId: number; pairsDestroyed: number };
    [Events.SURFACES_BOUND]: { outputId: number; username: string; reused: boolean };
    [Events.SURFACE_PAINTED]: { outputId: number; username: string; role: SurfaceRole };
    [Events.LOCK_REQUESTED]: { username: string };
    [Events.LOCK_STATE_CHANGED]: LockState;
    [Events.USER_SWITCHED]: { username: string };
    [Events.DESKTOP_READY]: { announced: boolean };
}

type Callback<T> = (payload: T) => void;

type ListenerTable = { [K in Events]: Callback<EventPayloads[K]>[] };

/**
 * Simple typed event emitter for publish/subscribe communication
 * between decoupled desktop components.
 */
export class EventEmitter {
    private readonly listeners: ListenerTable = {
        [Events.OUTPUT_ADDED]: [],
        [Events.OUTPUT_REMOVED]: [],
        [Events.SURFACES_BOUND]: [],
        [Events.SURFACE_PAINTED]: [],
        [Events.LOCK_REQUESTED]: [],
        [Events.LOCK_STATE_CHANGED]: [],
        [Events.USER_SWITCHED]: [],
        [Events.DESKTOP_READY]: []
    };

    /**
     * Subscribes a callback to an event.
     *
     * @param event - The event type.
     * @param callback - The handler to invoke when the event fires.
     * @returns Unsubscribe function.
     */
    public on<K extends Events>(event: K, callback: Callback<EventPayloads[K]>): () => void {
        this.listeners[event].push(callback);
        return (): void => this.off(event, callback);
    }

    /**
     * Unsubscribes a callback from an event.
     *
     * @param event - The event type.
     * @param callback - The handler to remove.
     */
    public off<K extends Events>(event: K, callback: Callback<EventPayloads[K]>): void {
        const list: Callback<EventPayloads[K]>[] = this.listeners[event];
        const index: number = list.indexOf(callback);
        if (index >= 0) list.splice(index, 1);
    }

    /**
     * Emits an event to all registered listeners.
     *
     * @param event - The event type.
     * @param payload - The event payload.
     */
    public emit<K extends Events>(event: K, payload: EventPayloads[K]): void {
        const list: Callback<EventPayloads[K]>[] = [...this.listeners[event]];
        list.forEach((callback: Callback<EventPayloads[K]>): void => callback(payload));
    }
}

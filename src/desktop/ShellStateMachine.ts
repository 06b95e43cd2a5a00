/**
 * @file Shell Protocol State Machine
 *
 * Interprets compositor events and drives the output registry, the lock
 * flow and the one-shot readiness announcement.
 *
 *   binding:   uninitialized -> bound
 *   readiness: not ready -> ready (terminal)
 *
 * Every handler runs to completion; repeated or out-of-order events are
 * absorbed by idempotency guards rather than rejected.
 *
 * @module desktop/ShellStateMachine
 */

import type { CursorKind, WidgetHandle, WindowHandle } from '../toolkit/types.js';
import type { ConfigurableSurface, Output, ShellBinding } from './types.js';
import type { DesktopSession } from './DesktopSession.js';
import type { BindResult } from './OutputRegistry.js';
import {
    OUTPUT_INTERFACE,
    SHELL_INTERFACE,
    SHELL_VERSION_MAX,
    type ShellConnector,
    type ShellEvent,
    type ShellProtocol
} from '../shell/protocol/types.js';
import { grabCursor_resolve } from '../shell/protocol/cursor.js';
import { Events } from '../core/state/events.js';
import { LockFlow } from './lock/LockFlow.js';

export class ShellStateMachine {
    private binding: ShellBinding = 'uninitialized';
    private shellGlobalId: number | null = null;
    private grabWindow: WindowHandle | null = null;
    private grabWidget: WidgetHandle | null = null;
    private readonly lock: LockFlow;
    private readonly unsubscribers: Array<() => void>;

    constructor(
        private readonly session: DesktopSession,
        private readonly connector: ShellConnector
    ) {
        this.lock = new LockFlow(session);
        this.unsubscribers = [
            session.events.on(Events.SURFACE_PAINTED, (): void => this.readiness_check()),
            session.events.on(Events.LOCK_REQUESTED, (): void => this.lock_request())
        ];
    }

    public binding_get(): ShellBinding {
        return this.binding;
    }

    public lockFlow_get(): LockFlow {
        return this.lock;
    }

    public event_dispatch(event: ShellEvent): void {
        switch (event.type) {
            case 'global-added':
                this.global_added(event.interface, event.id, event.version);
                break;
            case 'global-removed':
                this.global_removed(event.interface, event.id);
                break;
            case 'configure':
                this.configure(event.surface, event.edges, event.width, event.height);
                break;
            case 'prepare-lock':
                this.prepareLock();
                break;
            case 'grab-cursor':
                this.grabCursor(event.cursor);
                break;
            case 'user-switched':
                this.userSwitched(event.username);
                break;
            case 'output-geometry':
                this.session.outputs.output_geometry(event.output, event.transform);
                break;
            case 'output-scale':
                this.session.outputs.output_scale(event.output, event.scale);
                break;
        }
    }

    /**
     * A global appeared. The shell global is bound once; outputs are
     * registered and, once the shell is bound, given chrome for the current
     * user. Other interfaces are not ours.
     */
    public global_added(iface: string, id: number, version: number): void {
        if (iface === SHELL_INTERFACE) {
            this.shell_bind(id, version);
            return;
        }
        if (iface !== OUTPUT_INTERFACE) return;

        const output: Output | null = this.session.outputs.output_add(id);
        if (!output || this.binding !== 'bound') return;
        this.output_bind(output.id, this.session.currentUser);
    }

    public global_removed(iface: string, id: number): void {
        if (iface === OUTPUT_INTERFACE) {
            this.session.outputs.output_remove(id);
            return;
        }
        if (iface === SHELL_INTERFACE && id === this.shellGlobalId) {
            console.warn('[shell] shell global removed, keeping last binding');
        }
    }

    public configure(surfaceId: number, edges: number, width: number, height: number): void {
        const surface: ConfigurableSurface | undefined = this.session.outputs.surface_find(surfaceId);
        if (!surface) {
            console.warn(`[shell] configure for unknown surface ${surfaceId}, dropping`);
            return;
        }
        surface.configure(edges, width, height);
    }

    public prepareLock(): void {
        const shell: ShellProtocol | null = this.session.shell;
        if (!shell) {
            console.warn('[shell] prepare-lock before the shell is bound, ignoring');
            return;
        }
        this.lock.prepareLock(shell);
    }

    /** Remember the cursor the grab surface shows. No other effect. */
    public grabCursor(cursor: number): void {
        this.session.grabCursor = grabCursor_resolve(cursor);
    }

    /**
     * The compositor switched users. Every output gets the new user's pair
     * (cached or new), then the unlock-finish runs on a later turn so it
     * follows the rebinding requests.
     */
    public userSwitched(username: string): void {
        this.session.currentUser = username;
        if (this.binding === 'bound') {
            for (const output of this.session.outputs.outputs_list()) {
                this.output_bind(output.id, username);
            }
        }
        this.session.events.emit(Events.USER_SWITCHED, { username });
        this.lock.finish_defer();
    }

    /**
     * Announce the desktop once every active surface has painted. Sends
     * `desktop_ready` only when the negotiated version carries it.
     */
    public readiness_check(): void {
        if (this.session.painted || this.binding !== 'bound') return;
        if (!this.session.outputs.allPainted()) return;

        this.session.painted = true;
        const announced: boolean = this.session.interfaceVersion >= 2;
        if (announced) this.session.shell?.desktop_ready();
        this.session.events.emit(Events.DESKTOP_READY, { announced });
    }

    /** Ask the compositor to lock; older shells have no lock request. */
    public lock_request(): void {
        if (!this.session.shell || this.session.interfaceVersion < 2) return;
        this.session.shell.lock();
    }

    public shutdown(): void {
        this.unsubscribers.forEach((off: () => void): void => off());
        this.session.unlockDialog?.destroy();
        this.session.unlockDialog = null;
        this.session.outputs.outputs_destroyAll();
        this.grabWidget?.destroy();
        this.grabWindow?.destroy();
        this.grabWidget = null;
        this.grabWindow = null;
    }

    private shell_bind(id: number, version: number): void {
        if (this.binding === 'bound') {
            console.warn(`[shell] second shell global ${id} announced, ignoring`);
            return;
        }
        const negotiated: number = Math.min(version, SHELL_VERSION_MAX);
        const shell: ShellProtocol = this.connector.shell_bind(id, negotiated);
        this.session.shell = shell;
        this.session.interfaceVersion = negotiated;
        this.shellGlobalId = id;
        this.binding = 'bound';

        this.grabSurface_create(shell);

        for (const output of this.session.outputs.outputs_unbound()) {
            this.output_bind(output.id, this.session.currentUser);
        }
    }

    private grabSurface_create(shell: ShellProtocol): void {
        const window: WindowHandle | null = this.session.toolkit.window_create('grab');
        if (!window) {
            console.error('[shell] cannot allocate grab surface');
            return;
        }
        this.grabWindow = window;
        this.grabWidget = window.widget_add({
            enter: (): CursorKind => this.session.grabCursor
        });
        shell.grabSurface_set(window.surfaceId);
    }

    private output_bind(outputId: number, username: string): void {
        const result: BindResult = this.session.outputs.surfaces_bindForUser(outputId, username);
        if (!result.ok) {
            console.error(`[shell] output ${outputId}: ${result.error}`);
        }
    }
}

/**
 * @file Output Registry
 *
 * Tracks the compositor's outputs and the arena of surface pairs bound to
 * them. Pairs live in one map keyed by (output id, username); an Output only
 * holds usernames. At most one pair per output is active (bound to the
 * compositor) at a time; pairs for other users stay cached so switching back
 * reuses them instead of building new windows.
 *
 * Removing an output destroys every pair ever created for it.
 *
 * @module desktop/OutputRegistry
 */

import type { SurfaceId } from '../toolkit/types.js';
import type { ShellProtocol } from '../shell/protocol/types.js';
import type { ConfigurableSurface, Output } from './types.js';
import type { DesktopSession } from './DesktopSession.js';
import { Events } from '../core/state/events.js';
import { Panel } from './surfaces/Panel.js';
import { Background } from './surfaces/Background.js';

export interface SurfacePair {
    panel: Panel;
    background: Background;
}

export type BindResult =
    | { ok: true; reused: boolean }
    | { ok: false; error: string };

function pairKey(outputId: number, username: string): string {
    return `${outputId}/${username}`;
}

export class OutputRegistry {
    private readonly outputs: Map<number, Output> = new Map();
    private readonly pairs: Map<string, SurfacePair> = new Map();

    constructor(private readonly session: DesktopSession) {}

    /**
     * Register a newly announced output. Chrome is not created here; the
     * state machine binds it once the shell is available.
     *
     * @returns The output, or null when the id is already registered.
     */
    public output_add(id: number): Output | null {
        if (this.outputs.has(id)) {
            console.warn(`[outputs] output ${id} already registered, ignoring`);
            return null;
        }
        const output: Output = { id, transform: 0, scale: 1, activeUser: null, users: new Set<string>() };
        this.outputs.set(id, output);
        this.session.events.emit(Events.OUTPUT_ADDED, { outputId: id });
        return output;
    }

    /**
     * Destroy an output and all of its surface pairs, active and cached.
     *
     * @returns Number of pairs destroyed; 0 for an unknown id.
     */
    public output_remove(id: number): number {
        const output: Output | undefined = this.outputs.get(id);
        if (!output) return 0;

        let destroyed: number = 0;
        for (const username of output.users) {
            const key: string = pairKey(id, username);
            const pair: SurfacePair | undefined = this.pairs.get(key);
            if (!pair) continue;
            pair.panel.destroy();
            pair.background.destroy();
            this.pairs.delete(key);
            destroyed += 1;
        }
        output.users.clear();
        output.activeUser = null;
        this.outputs.delete(id);

        this.session.events.emit(Events.OUTPUT_REMOVED, { outputId: id, pairsDestroyed: destroyed });
        return destroyed;
    }

    /**
     * Make `username`'s pair the active one on an output, building it if this
     * output has never shown that user, and tell the compositor about it.
     */
    public surfaces_bindForUser(outputId: number, username: string): BindResult {
        const output: Output | undefined = this.outputs.get(outputId);
        if (!output) return { ok: false, error: `unknown output ${outputId}` };

        const shell: ShellProtocol | null = this.session.shell;
        if (!shell) return { ok: false, error: 'shell not bound' };

        const key: string = pairKey(outputId, username);
        let pair: SurfacePair | undefined = this.pairs.get(key);
        const reused: boolean = pair !== undefined;

        if (!pair) {
            const created: SurfacePair | null = this.pair_create(outputId, username);
            if (!created) {
                console.error(`[outputs] cannot allocate surfaces for ${username} on output ${outputId}`);
                return { ok: false, error: 'surface allocation failed' };
            }
            pair = created;
            this.pairs.set(key, pair);
            output.users.add(username);
        }

        output.activeUser = username;
        this.pairOutput_apply(pair, output);
        shell.panel_set(output.id, pair.panel.window.surfaceId);
        shell.background_set(output.id, pair.background.window.surfaceId);

        this.session.events.emit(Events.SURFACES_BOUND, { outputId, username, reused });
        return { ok: true, reused };
    }

    /**
     * True when every active panel and background has painted since its last
     * resize. Outputs without an active pair do not count.
     */
    public allPainted(): boolean {
        for (const output of this.outputs.values()) {
            const pair: SurfacePair | undefined = this.activePair_get(output.id);
            if (!pair) continue;
            if (!pair.panel.painted || !pair.background.painted) return false;
        }
        return true;
    }

    public output_geometry(id: number, transform: number): void {
        const output: Output | undefined = this.outputs.get(id);
        if (!output) return;
        output.transform = transform;
        const pair: SurfacePair | undefined = this.activePair_get(id);
        if (pair) this.pairOutput_apply(pair, output);
    }

    public output_scale(id: number, scale: number): void {
        const output: Output | undefined = this.outputs.get(id);
        if (!output) return;
        output.scale = scale;
        const pair: SurfacePair | undefined = this.activePair_get(id);
        if (pair) this.pairOutput_apply(pair, output);
    }

    /**
     * Find the panel or background that owns a compositor surface.
     */
    public surface_find(surfaceId: SurfaceId): ConfigurableSurface | undefined {
        for (const pair of this.pairs.values()) {
            if (pair.panel.window.surfaceId === surfaceId) return pair.panel;
            if (pair.background.window.surfaceId === surfaceId) return pair.background;
        }
        return undefined;
    }

    public output_get(id: number): Output | undefined {
        return this.outputs.get(id);
    }

    public outputs_list(): Output[] {
        return [...this.outputs.values()];
    }

    /** Outputs that have never had chrome bound. */
    public outputs_unbound(): Output[] {
        return this.outputs_list().filter((o: Output): boolean => o.activeUser === null);
    }

    public pair_get(outputId: number, username: string): SurfacePair | undefined {
        return this.pairs.get(pairKey(outputId, username));
    }

    public activePair_get(outputId: number): SurfacePair | undefined {
        const output: Output | undefined = this.outputs.get(outputId);
        if (!output || output.activeUser === null) return undefined;
        return this.pairs.get(pairKey(outputId, output.activeUser));
    }

    /** Number of allocated pairs, for one output or overall. */
    public pairs_count(outputId?: number): number {
        if (outputId === undefined) return this.pairs.size;
        return this.outputs.get(outputId)?.users.size ?? 0;
    }

    public outputs_destroyAll(): void {
        for (const id of [...this.outputs.keys()]) this.output_remove(id);
    }

    private pair_create(outputId: number, username: string): SurfacePair | null {
        const ctx = this.session.chrome_context();
        const panel: Panel | null = Panel.create(ctx, outputId, username);
        if (!panel) return null;
        const background: Background | null = Background.create(ctx, outputId, username);
        if (!background) {
            panel.destroy();
            return null;
        }
        return { panel, background };
    }

    private pairOutput_apply(pair: SurfacePair, output: Output): void {
        pair.panel.window.bufferTransform_set(output.transform);
        pair.background.window.bufferTransform_set(output.transform);
        pair.panel.window.bufferScale_set(output.scale);
        pair.background.window.bufferScale_set(output.scale);
    }
}

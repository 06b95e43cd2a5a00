/**
 * @file Desktop Model Types
 *
 * Shared shapes for outputs, surface pairs and the lock flow.
 *
 * @module desktop/types
 */

/** Which half of a surface pair a surface plays. */
export type SurfaceRole = 'panel' | 'background';

/**
 * One compositor output. Holds only keys into the surface-pair arena,
 * never the pairs themselves.
 */
export interface Output {
    /** Server-assigned global id, stable for the output's lifetime. */
    readonly id: number;
    transform: number;
    scale: number;
    /** Username of the pair currently bound to the compositor. */
    activeUser: string | null;
    /** Usernames with a cached pair on this output (active one included). */
    readonly users: Set<string>;
}

export type LockState =
    | 'unlocked'
    | 'awaiting-dialog'
    | 'awaiting-credential-submit'
    | 'unlocking';

export type ShellBinding = 'uninitialized' | 'bound';

/** A surface that reacts to the compositor's configure event. */
export interface ConfigurableSurface {
    readonly role: SurfaceRole;
    readonly outputId: number;
    readonly username: string;
    configure(edges: number, width: number, height: number): void;
}

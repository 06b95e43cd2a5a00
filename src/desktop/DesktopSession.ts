/**
 * @file Desktop Session
 *
 * The single session-wide context object. Every collaborator (toolkit,
 * settings, account source, process launcher) is handed in at construction;
 * nothing here reaches for process-global state.
 *
 * @module desktop/DesktopSession
 */

import type { CursorKind, Toolkit } from '../toolkit/types.js';
import type { ShellProtocol } from '../shell/protocol/types.js';
import type { EnvSource, ShellSettings } from '../config/settings.js';
import type { AccountSource } from '../accounts/passwd.js';
import type { ProcessLauncher } from './panel/ProcessLauncher.js';
import type { ChromeContext } from './surfaces/ChromeContext.js';
import type { UnlockDialog } from './lock/UnlockDialog.js';
import { EventEmitter } from '../core/state/events.js';
import { OutputRegistry } from './OutputRegistry.js';

export const DEFAULT_USERNAME: string = 'Guest';

export interface DesktopSessionOptions {
    toolkit: Toolkit;
    settings: ShellSettings;
    accounts: AccountSource;
    processLauncher: ProcessLauncher;
    /** Initial user; the compositor's user-switched event replaces it. */
    username?: string;
    /** Environment handed to launched programs. Defaults to process.env. */
    env?: EnvSource;
    now?: () => Date;
}

export class DesktopSession {
    public readonly toolkit: Toolkit;
    public readonly settings: ShellSettings;
    public readonly accounts: AccountSource;
    public readonly processLauncher: ProcessLauncher;
    public readonly events: EventEmitter = new EventEmitter();
    public readonly outputs: OutputRegistry;

    public currentUser: string;
    /** Whether prepare-lock shows the unlock dialog or unlocks straight away. */
    public locking: boolean;
    public shell: ShellProtocol | null = null;
    /** Negotiated shell version, 0 until bound. */
    public interfaceVersion: number = 0;
    public grabCursor: CursorKind = 'left_ptr';
    /** Set once the desktop has been announced ready. */
    public painted: boolean = false;
    public unlockDialog: UnlockDialog | null = null;

    private readonly env: EnvSource;
    private readonly now: () => Date;

    constructor(options: DesktopSessionOptions) {
        this.toolkit = options.toolkit;
        this.settings = options.settings;
        this.accounts = options.accounts;
        this.processLauncher = options.processLauncher;
        this.currentUser = options.username ?? DEFAULT_USERNAME;
        this.env = options.env ?? process.env;
        this.now = options.now ?? ((): Date => new Date());
        this.locking = this.settings.locking_resolve();
        this.outputs = new OutputRegistry(this);
    }

    /** Collaborators a panel or background builds itself from. */
    public chrome_context(): ChromeContext {
        return {
            toolkit: this.toolkit,
            settings: this.settings,
            processLauncher: this.processLauncher,
            events: this.events,
            env: this.env,
            now: this.now
        };
    }
}

/**
 * @file Lock Flow
 *
 * Drives the unlock dialog, its password dialog and the deferred
 * unlock-finish. State is derived from what exists:
 *
 *   unlocked                    no dialog, no finish queued
 *   awaiting-dialog             unlock dialog without a password dialog
 *   awaiting-credential-submit  unlock dialog with one password dialog
 *   unlocking                   finish queued
 *
 * @module desktop/lock/LockFlow
 */

import type { LockState } from '../types.js';
import type { DesktopSession } from '../DesktopSession.js';
import type { ShellProtocol } from '../../shell/protocol/types.js';
import { Events } from '../../core/state/events.js';
import { UnlockDialog, type UnlockEntry } from './UnlockDialog.js';
import { PasswordDialog, type PasswordKeyAction } from './PasswordDialog.js';

export class LockFlow {
    private finishPending: boolean = false;
    private lastState: LockState = 'unlocked';

    constructor(private readonly session: DesktopSession) {}

    public state_get(): LockState {
        if (this.finishPending) return 'unlocking';
        const dialog: UnlockDialog | null = this.session.unlockDialog;
        if (!dialog) return 'unlocked';
        return dialog.passwordDialog ? 'awaiting-credential-submit' : 'awaiting-dialog';
    }

    /**
     * The compositor is about to lock. With locking disabled, unlock straight
     * away (closing any dialog already open); otherwise show the unlock
     * dialog unless one is already up.
     */
    public prepareLock(shell: ShellProtocol): void {
        if (!this.session.locking) {
            this.dialog_close();
            shell.unlock();
            this.state_publish();
            return;
        }
        if (this.session.unlockDialog) return;

        const dialog: UnlockDialog | null = UnlockDialog.create(
            this.session.toolkit,
            shell,
            this.session.accounts,
            (entry: UnlockEntry): void => this.entry_activate(entry.username)
        );
        if (!dialog) {
            console.error('[lock] cannot allocate unlock dialog');
            return;
        }
        this.session.unlockDialog = dialog;
        this.state_publish();
    }

    /**
     * Open the password dialog for one entry. No-op while one is open, while
     * the dialog is closing, or for a name the dialog does not list.
     */
    public entry_activate(username: string): void {
        const dialog: UnlockDialog | null = this.session.unlockDialog;
        const shell: ShellProtocol | null = this.session.shell;
        if (!dialog || !shell || dialog.closing || dialog.passwordDialog) return;
        if (!dialog.entry_has(username)) return;

        const password: PasswordDialog | null = PasswordDialog.create(
            this.session.toolkit,
            shell,
            username,
            (action: PasswordKeyAction): void => this.passwordKey_handle(action)
        );
        if (!password) {
            console.error(`[lock] cannot allocate password dialog for ${username}`);
            return;
        }
        dialog.passwordDialog = password;
        this.state_publish();
    }

    public passwordKey_handle(action: PasswordKeyAction): void {
        if (action === 'cancel') this.passwordDialog_cancel();
        else if (action === 'submit') this.credentials_submit();
    }

    /** Escape: close only the password dialog. */
    public passwordDialog_cancel(): void {
        const dialog: UnlockDialog | null = this.session.unlockDialog;
        if (!dialog?.passwordDialog) return;
        dialog.passwordDialog.destroy();
        dialog.passwordDialog = null;
        this.state_publish();
    }

    /**
     * Enter: ask the compositor to switch to the entry's user, once per
     * dialog. The password dialog closes either way. The session user changes
     * only when the compositor answers with user-switched.
     */
    public credentials_submit(): void {
        const dialog: UnlockDialog | null = this.session.unlockDialog;
        const password: PasswordDialog | null = dialog?.passwordDialog ?? null;
        if (!dialog || !password) return;

        if (!dialog.closing && this.session.shell) {
            this.session.shell.user_switch(password.username);
            dialog.closing = true;
        }
        password.destroy();
        dialog.passwordDialog = null;
        this.state_publish();
    }

    /**
     * Queue the unlock-finish for a later turn. At most one is queued at a
     * time; once queued it runs exactly once.
     */
    public finish_defer(): void {
        if (this.finishPending) return;
        this.finishPending = true;
        this.session.toolkit.task_defer((): void => this.finish_run());
        this.state_publish();
    }

    public finish_pending(): boolean {
        return this.finishPending;
    }

    private finish_run(): void {
        this.finishPending = false;
        this.session.shell?.unlock();
        this.dialog_close();
        this.state_publish();
    }

    private dialog_close(): void {
        this.session.unlockDialog?.destroy();
        this.session.unlockDialog = null;
    }

    private state_publish(): void {
        const state: LockState = this.state_get();
        if (state === this.lastState) return;
        this.lastState = state;
        this.session.events.emit(Events.LOCK_STATE_CHANGED, state);
    }
}

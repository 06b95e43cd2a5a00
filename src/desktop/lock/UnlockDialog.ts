/**
 * @file Unlock Dialog
 *
 * "Choose a user" dialog shown while the session is locked: one entry per
 * selectable account. Activating an entry opens that user's password dialog.
 *
 * @module desktop/lock/UnlockDialog
 */

import type { CursorKind, Toolkit, WidgetHandle, WindowHandle } from '../../toolkit/types.js';
import type { ShellProtocol } from '../../shell/protocol/types.js';
import type { AccountEntry, AccountSource } from '../../accounts/passwd.js';
import { account_isSelectable } from '../../accounts/passwd.js';
import type { PasswordDialog } from './PasswordDialog.js';

const ENTRY_X: number = 50;
const ENTRY_Y: number = 100;
const ICON_SIZE: number = 58;
const ENTRY_SPACING: number = 10;

/** Width of a name the base dialog size already fits. */
const NAME_FIT: number = 7;

export interface UnlockEntry {
    readonly username: string;
    readonly widget: WidgetHandle;
    focused: boolean;
}

/**
 * Dialog size for the given entry names: wider for each character past the
 * base fit, taller for each entry past the first.
 */
export function unlockDialog_size(names: readonly string[]): { width: number; height: number } {
    const longest: number = names.reduce((max: number, name: string): number => Math.max(max, name.length), 0);
    const extwidth: number = Math.max(longest - NAME_FIT, 0);
    const rows: number = Math.max(names.length - 1, 0);
    return { width: 260 + extwidth * 10, height: 200 + rows * 68 };
}

export class UnlockDialog {
    public readonly entries: UnlockEntry[] = [];
    /** Set once credentials were submitted; blocks a second submission. */
    public closing: boolean = false;
    public passwordDialog: PasswordDialog | null = null;
    private readonly widget: WidgetHandle;

    /**
     * Build the dialog, make it the lock surface and schedule its size.
     *
     * @returns The dialog, or null when the toolkit has no window to give.
     */
    public static create(
        toolkit: Toolkit,
        shell: ShellProtocol,
        accounts: AccountSource,
        onActivate: (entry: UnlockEntry) => void
    ): UnlockDialog | null {
        const window: WindowHandle | null = toolkit.window_create('Choose a user');
        if (!window) return null;

        const selectable: AccountEntry[] = accounts.accounts_list().filter(account_isSelectable);
        const dialog: UnlockDialog = new UnlockDialog(window, selectable, onActivate);

        shell.lockSurface_set(window.surfaceId);
        const size: { width: number; height: number } = unlockDialog_size(
            selectable.map((a: AccountEntry): string => a.username)
        );
        window.resize_schedule(size.width, size.height);
        return dialog;
    }

    private constructor(
        public readonly window: WindowHandle,
        accounts: AccountEntry[],
        onActivate: (entry: UnlockEntry) => void
    ) {
        this.widget = window.widget_add({
            resize: (): void => this.layout()
        });

        for (const account of accounts) {
            const entry: UnlockEntry = {
                username: account.username,
                focused: false,
                widget: this.widget.child_add({
                    enter: (): CursorKind => {
                        entry.focused = true;
                        entry.widget.redraw_schedule();
                        return 'left_ptr';
                    },
                    leave: (): void => {
                        entry.focused = false;
                        entry.widget.redraw_schedule();
                    },
                    button: (_button, state): void => {
                        if (state === 'released') onActivate(entry);
                    },
                    touchUp: (): void => onActivate(entry)
                })
            };
            this.entries.push(entry);
        }
    }

    public entry_has(username: string): boolean {
        return this.entries.some((e: UnlockEntry): boolean => e.username === username);
    }

    public destroy(): void {
        this.passwordDialog?.destroy();
        this.passwordDialog = null;
        this.widget.destroy();
        this.window.destroy();
    }

    private layout(): void {
        let y: number = ENTRY_Y;
        for (const entry of this.entries) {
            entry.widget.allocation_set({ x: ENTRY_X, y, width: ICON_SIZE, height: ICON_SIZE });
            y += ICON_SIZE + ENTRY_SPACING;
        }
    }
}

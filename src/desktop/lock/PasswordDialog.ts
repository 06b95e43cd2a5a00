/**
 * @file Password Dialog
 *
 * The masked password prompt opened from one unlock-dialog entry, and the
 * text buffer behind it.
 *
 * @module desktop/lock/PasswordDialog
 */

import type { KeySym, KeyState, Toolkit, WidgetHandle, WindowHandle } from '../../toolkit/types.js';
import type { ShellProtocol } from '../../shell/protocol/types.js';

export const PASSWORD_MAX_LENGTH: number = 30;
export const PASSWORD_DIALOG_WIDTH: number = 400;
export const PASSWORD_DIALOG_HEIGHT: number = 100;

/** What a key did to the buffer; the caller acts on cancel and submit. */
export type PasswordKeyAction = 'cancel' | 'submit' | 'edited' | 'ignored';

function printable_check(text: string): boolean {
    if (text.length !== 1) return false;
    const code: number = text.charCodeAt(0);
    return code >= 0x20 && code < 0x7f;
}

/**
 * Editable text with a cursor offset, `0 <= cursor <= length`.
 */
export class PasswordBuffer {
    private text: string = '';
    private cursor: number = 0;

    public key_apply(key: KeySym, state: KeyState): PasswordKeyAction {
        if (state !== 'pressed') return 'ignored';

        switch (key.name) {
            case 'Escape':
                return 'cancel';
            case 'Return':
            case 'KP_Enter':
                return 'submit';
            case 'BackSpace':
                if (this.cursor === 0) return 'ignored';
                this.text = this.text.slice(0, this.cursor - 1) + this.text.slice(this.cursor);
                this.cursor -= 1;
                return 'edited';
            case 'Delete':
            case 'Left':
            case 'Right':
            case 'Tab':
                return 'ignored';
            case 'char':
                if (!printable_check(key.text)) return 'ignored';
                if (this.text.length >= PASSWORD_MAX_LENGTH) return 'ignored';
                this.text = this.text.slice(0, this.cursor) + key.text + this.text.slice(this.cursor);
                this.cursor += 1;
                return 'edited';
            default:
                return 'ignored';
        }
    }

    public text_get(): string {
        return this.text;
    }

    public cursor_get(): number {
        return this.cursor;
    }

    /** What the dialog renders: one `*` per character. */
    public masked_get(): string {
        return '*'.repeat(this.text.length);
    }
}

export class PasswordDialog {
    public readonly buffer: PasswordBuffer = new PasswordBuffer();
    private readonly widget: WidgetHandle;

    /**
     * Open the prompt, make it the lock surface and size it.
     *
     * @returns The dialog, or null when the toolkit has no window to give.
     */
    public static create(
        toolkit: Toolkit,
        shell: ShellProtocol,
        username: string,
        onKey: (action: PasswordKeyAction) => void
    ): PasswordDialog | null {
        const window: WindowHandle | null = toolkit.window_create('Enter your password');
        if (!window) return null;
        const dialog: PasswordDialog = new PasswordDialog(window, username, onKey);
        shell.lockSurface_set(window.surfaceId);
        window.resize_schedule(PASSWORD_DIALOG_WIDTH, PASSWORD_DIALOG_HEIGHT);
        return dialog;
    }

    private constructor(
        public readonly window: WindowHandle,
        public readonly username: string,
        onKey: (action: PasswordKeyAction) => void
    ) {
        this.widget = window.widget_add({});
        window.keyHandler_set((key: KeySym, state: KeyState): void => {
            const action: PasswordKeyAction = this.buffer.key_apply(key, state);
            if (action === 'edited') this.widget.redraw_schedule();
            if (action !== 'ignored') onKey(action);
        });
    }

    public destroy(): void {
        this.widget.destroy();
        this.window.destroy();
    }
}

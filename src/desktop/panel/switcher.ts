/**
 * @file Panel User Switcher
 *
 * Shows the panel owner's name. Pressing it opens a menu whose entries
 * both ask the compositor to lock, which in turn starts the unlock dialog.
 *
 * @module desktop/panel/switcher
 */

import type { CursorKind, Toolkit, WidgetHandle, WindowHandle } from '../../toolkit/types.js';

export const SWITCHER_MENU: readonly string[] = ['Switch user', 'Logout'];

export class PanelSwitcher {
    public readonly widget: WidgetHandle;
    public focused: boolean = false;

    constructor(
        parent: WidgetHandle,
        window: WindowHandle,
        toolkit: Toolkit,
        public readonly username: string,
        lock_request: () => void
    ) {
        this.widget = parent.child_add({
            enter: (): CursorKind => {
                this.focused = true;
                this.widget.redraw_schedule();
                return 'left_ptr';
            },
            leave: (): void => {
                this.focused = false;
                this.widget.redraw_schedule();
            },
            button: (_button, state): void => {
                if (state !== 'pressed') return;
                toolkit.menu_show(window, SWITCHER_MENU, (): void => lock_request());
            }
        });
    }

    /** Width the switcher needs: name text, icon, padding. */
    public width_measure(): number {
        return this.username.length * 8 + 20 + 24;
    }

    public destroy(): void {
        this.widget.destroy();
    }
}

import { describe, it, expect } from 'vitest';
import { grabCursor_resolve } from './cursor.js';
import { ShellCursor } from './types.js';

describe('grabCursor_resolve', (): void => {
    it('maps protocol cursors to toolkit cursors', (): void => {
        expect(grabCursor_resolve(ShellCursor.NONE)).toBe('blank');
        expect(grabCursor_resolve(ShellCursor.BUSY)).toBe('watch');
        expect(grabCursor_resolve(ShellCursor.MOVE)).toBe('dragging');
        expect(grabCursor_resolve(ShellCursor.RESIZE_TOP_LEFT)).toBe('top_left');
        expect(grabCursor_resolve(ShellCursor.RESIZE_BOTTOM_RIGHT)).toBe('bottom_right');
        expect(grabCursor_resolve(ShellCursor.ARROW)).toBe('left_ptr');
    });

    it('falls back to the arrow for unknown values', (): void => {
        expect(grabCursor_resolve(12)).toBe('left_ptr');
        expect(grabCursor_resolve(999)).toBe('left_ptr');
    });
});

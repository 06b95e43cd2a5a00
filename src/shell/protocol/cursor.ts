/**
 * @file Grab Cursor Mapping
 *
 * Table from the protocol's cursor enum to the toolkit's cursor images.
 *
 * @module
 */

import type { CursorKind } from '../../toolkit/types.js';
import { ShellCursor } from './types.js';

const CURSOR_TABLE: ReadonlyMap<number, CursorKind> = new Map<number, CursorKind>([
    [ShellCursor.NONE, 'blank'],
    [ShellCursor.BUSY, 'watch'],
    [ShellCursor.MOVE, 'dragging'],
    [ShellCursor.RESIZE_TOP, 'top'],
    [ShellCursor.RESIZE_BOTTOM, 'bottom'],
    [ShellCursor.RESIZE_LEFT, 'left'],
    [ShellCursor.RESIZE_RIGHT, 'right'],
    [ShellCursor.RESIZE_TOP_LEFT, 'top_left'],
    [ShellCursor.RESIZE_TOP_RIGHT, 'top_right'],
    [ShellCursor.RESIZE_BOTTOM_LEFT, 'bottom_left'],
    [ShellCursor.RESIZE_BOTTOM_RIGHT, 'bottom_right'],
    [ShellCursor.ARROW, 'left_ptr']
]);

/**
 * Resolve a protocol cursor value. Unknown values fall back to the arrow.
 */
export function grabCursor_resolve(cursor: number): CursorKind {
    return CURSOR_TABLE.get(cursor) ?? 'left_ptr';
}

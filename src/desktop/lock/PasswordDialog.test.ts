import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { PasswordBuffer, PASSWORD_MAX_LENGTH } from './PasswordDialog.js';
import type { KeySym } from '../../toolkit/types.js';

function chars(text: string): KeySym[] {
    return [...text].map((ch: string): KeySym => ({ name: 'char', text: ch }));
}

describe('PasswordBuffer', (): void => {
    it('inserts printable characters and masks them', (): void => {
        const buffer: PasswordBuffer = new PasswordBuffer();
        for (const key of chars('s3cr3t!')) expect(buffer.key_apply(key, 'pressed')).toBe('edited');
        expect(buffer.text_get()).toBe('s3cr3t!');
        expect(buffer.cursor_get()).toBe(7);
        expect(buffer.masked_get()).toBe('*******');
    });

    it('rejects non-printable and multi-unit text', (): void => {
        const buffer: PasswordBuffer = new PasswordBuffer();
        expect(buffer.key_apply({ name: 'char', text: '\t' }, 'pressed')).toBe('ignored');
        expect(buffer.key_apply({ name: 'char', text: 'é' }, 'pressed')).toBe('ignored');
        expect(buffer.key_apply({ name: 'char', text: 'ab' }, 'pressed')).toBe('ignored');
        expect(buffer.key_apply({ name: 'char', text: '' }, 'pressed')).toBe('ignored');
        expect(buffer.text_get()).toBe('');
    });

    it('stops inserting at the length limit', (): void => {
        const buffer: PasswordBuffer = new PasswordBuffer();
        for (const key of chars('x'.repeat(PASSWORD_MAX_LENGTH))) buffer.key_apply(key, 'pressed');
        expect(buffer.key_apply({ name: 'char', text: 'y' }, 'pressed')).toBe('ignored');
        expect(buffer.text_get()).toBe('x'.repeat(30));
    });

    it('deletes before the cursor and ignores BackSpace at offset 0', (): void => {
        const buffer: PasswordBuffer = new PasswordBuffer();
        expect(buffer.key_apply({ name: 'BackSpace' }, 'pressed')).toBe('ignored');
        for (const key of chars('abc')) buffer.key_apply(key, 'pressed');
        expect(buffer.key_apply({ name: 'BackSpace' }, 'pressed')).toBe('edited');
        expect(buffer.text_get()).toBe('ab');
        expect(buffer.cursor_get()).toBe(2);
    });

    it('ignores navigation keys and key releases', (): void => {
        const buffer: PasswordBuffer = new PasswordBuffer();
        for (const key of chars('ab')) buffer.key_apply(key, 'pressed');
        for (const name of ['Delete', 'Left', 'Right', 'Tab'] as const) {
            expect(buffer.key_apply({ name }, 'pressed')).toBe('ignored');
        }
        expect(buffer.key_apply({ name: 'char', text: 'c' }, 'released')).toBe('ignored');
        expect(buffer.key_apply({ name: 'Return' }, 'released')).toBe('ignored');
        expect(buffer.text_get()).toBe('ab');
        expect(buffer.cursor_get()).toBe(2);
    });

    it('reports cancel and submit', (): void => {
        const buffer: PasswordBuffer = new PasswordBuffer();
        expect(buffer.key_apply({ name: 'Escape' }, 'pressed')).toBe('cancel');
        expect(buffer.key_apply({ name: 'Return' }, 'pressed')).toBe('submit');
        expect(buffer.key_apply({ name: 'KP_Enter' }, 'pressed')).toBe('submit');
    });

    it('keeps the cursor within the text for any key sequence', (): void => {
        const keyArb: fc.Arbitrary<KeySym> = fc.oneof(
            fc.constantFrom<KeySym>({ name: 'BackSpace' }, { name: 'Delete' }, { name: 'Left' }, { name: 'Right' }),
            fc.string({ minLength: 0, maxLength: 2 }).map((text: string): KeySym => ({ name: 'char', text }))
        );
        fc.assert(fc.property(fc.array(keyArb, { maxLength: 80 }), (keys: KeySym[]): void => {
            const buffer: PasswordBuffer = new PasswordBuffer();
            for (const key of keys) buffer.key_apply(key, 'pressed');
            const length: number = buffer.text_get().length;
            expect(length).toBeLessThanOrEqual(PASSWORD_MAX_LENGTH);
            expect(buffer.cursor_get()).toBeGreaterThanOrEqual(0);
            expect(buffer.cursor_get()).toBeLessThanOrEqual(length);
            expect(buffer.masked_get()).toBe('*'.repeat(length));
        }));
    });
});

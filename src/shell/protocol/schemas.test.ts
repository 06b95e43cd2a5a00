import { describe, it, expect } from 'vitest';
import { ShellEventSchema } from './schemas.js';

describe('ShellEventSchema', (): void => {
    it('accepts every event kind', (): void => {
        const events: unknown[] = [
            { type: 'global-added', interface: 'wl_output', id: 7, version: 2 },
            { type: 'global-removed', interface: 'wl_output', id: 7 },
            { type: 'configure', surface: 100, edges: 0, width: 1024, height: 768 },
            { type: 'prepare-lock' },
            { type: 'grab-cursor', cursor: 3 },
            { type: 'user-switched', username: 'alice' },
            { type: 'output-geometry', output: 7, transform: 1 },
            { type: 'output-scale', output: 7, scale: 2 }
        ];
        for (const event of events) {
            expect(ShellEventSchema.safeParse(event).success).toBe(true);
        }
    });

    it('rejects unknown types and bad fields', (): void => {
        expect(ShellEventSchema.safeParse({ type: 'explode' }).success).toBe(false);
        expect(ShellEventSchema.safeParse({ type: 'global-added', interface: '', id: 1, version: 1 }).success).toBe(false);
        expect(ShellEventSchema.safeParse({ type: 'global-added', interface: 'wl_output', id: 1, version: 0 }).success).toBe(false);
        expect(ShellEventSchema.safeParse({ type: 'configure', surface: 1, edges: 0, width: -1, height: 1 }).success).toBe(false);
        expect(ShellEventSchema.safeParse({ type: 'user-switched', username: '' }).success).toBe(false);
        expect(ShellEventSchema.safeParse({ type: 'output-geometry', output: 1, transform: 8 }).success).toBe(false);
        expect(ShellEventSchema.safeParse({ type: 'output-scale', output: 1, scale: 0 }).success).toBe(false);
    });
});

import { describe, it, expect } from 'vitest';
import fs from 'fs';
import { trace_parse, trace_replay, type ReplayLine, type Trace } from './TraceReplay.js';

function trace_load(text: string): Trace {
    const parsed = trace_parse(text);
    if (!parsed.ok) throw new Error(parsed.error);
    return parsed.trace;
}

function notes_of(transcript: ReplayLine[]): string[] {
    return transcript.flatMap((line: ReplayLine): string[] => (line.kind === 'note' ? [line.message] : []));
}

describe('trace_parse', (): void => {
    it('applies defaults for optional fields', (): void => {
        const trace: Trace = trace_load('steps:\n  - frame: true\n');
        expect(trace).toEqual({ accounts: [], steps: [{ frame: true }] });
    });

    it('rejects unknown steps with their path', (): void => {
        const parsed = trace_parse('steps:\n  - bogus: 1\n');
        expect(parsed.ok).toBe(false);
        if (parsed.ok) return;
        expect(parsed.error.startsWith('Invalid trace: steps.0: ')).toBe(true);
    });

    it('rejects invalid events inside steps', (): void => {
        const parsed = trace_parse('steps:\n  - event: { type: configure, surface: 1 }\n');
        expect(parsed.ok).toBe(false);
    });

    it('reports YAML errors', (): void => {
        const parsed = trace_parse('steps: [');
        expect(parsed.ok).toBe(false);
        if (parsed.ok) return;
        expect(parsed.error.startsWith('YAML error: ')).toBe(true);
    });
});

describe('trace_replay', (): void => {
    it('replays the lock and switch example', (): void => {
        const text: string = fs.readFileSync(new URL('../../../traces/lock-and-switch.yaml', import.meta.url), 'utf-8');
        const result = trace_replay(trace_load(text));

        expect(result.requests).toEqual([
            { request: 'set_grab_surface', surface: 100 },
            { request: 'set_panel', output: 7, surface: 101 },
            { request: 'set_background', output: 7, surface: 102 },
            { request: 'desktop_ready' },
            { request: 'set_lock_surface', surface: 103 },
            { request: 'set_lock_surface', surface: 104 },
            { request: 'switch_user', username: 'alice' },
            { request: 'set_panel', output: 7, surface: 105 },
            { request: 'set_background', output: 7, surface: 106 },
            { request: 'unlock' }
        ]);
        expect(notes_of(result.transcript)).toEqual([
            'desktop ready',
            'lock: awaiting-dialog',
            'lock: awaiting-credential-submit',
            'lock: awaiting-dialog',
            'user: alice',
            'lock: unlocking',
            'lock: unlocked'
        ]);
        expect(result.session.currentUser).toBe('alice');
    });

    it('replays the hotplug example on a version 1 shell', (): void => {
        const text: string = fs.readFileSync(new URL('../../../traces/hotplug.yaml', import.meta.url), 'utf-8');
        const result = trace_replay(trace_load(text));

        expect(result.requests).toEqual([
            { request: 'set_grab_surface', surface: 100 },
            { request: 'set_panel', output: 3, surface: 101 },
            { request: 'set_background', output: 3, surface: 102 },
            { request: 'set_panel', output: 4, surface: 103 },
            { request: 'set_background', output: 4, surface: 104 }
        ]);
        expect(result.toolkit.window_get(103)?.bufferScale).toBe(2);
        expect(result.toolkit.window_get(101)).toBeUndefined();
        expect(result.session.outputs.outputs_list().map((o) => o.id)).toEqual([4]);
    });

    it('records a warning for input with no target', (): void => {
        const result = trace_replay(trace_load('steps:\n  - activate: alice\n  - key: Escape\n'));
        expect(result.transcript).toEqual([
            { kind: 'warning', message: 'activate alice: no such unlock entry' },
            { kind: 'warning', message: 'key Escape: no password dialog' }
        ]);
    });

    it('keeps incoming events in the transcript ahead of their requests', (): void => {
        const result = trace_replay(trace_load(
            'steps:\n  - event: { type: global-added, interface: desktop_shell, id: 1, version: 2 }\n'
        ));
        expect(result.transcript).toEqual([
            { kind: 'in', event: { type: 'global-added', interface: 'desktop_shell', id: 1, version: 2 } },
            { kind: 'out', request: { request: 'set_grab_surface', surface: 100 } }
        ]);
    });
});

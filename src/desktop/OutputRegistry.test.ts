import { describe, it, expect, vi, afterEach } from 'vitest';
import { DesktopSession } from './DesktopSession.js';
import { Events } from '../core/state/events.js';
import { ShellSettings } from '../config/settings.js';
import { EMPTY_CONFIG } from '../config/schemas.js';
import { StaticAccountSource } from '../accounts/passwd.js';
import { RecordingProcessLauncher } from './panel/ProcessLauncher.js';
import { HeadlessToolkit } from '../toolkit/HeadlessToolkit.js';
import { RecordingShellConnector } from '../shell/protocol/types.js';

function session_make(bound: boolean = true): { session: DesktopSession; toolkit: HeadlessToolkit; connector: RecordingShellConnector } {
    const toolkit: HeadlessToolkit = new HeadlessToolkit();
    const connector: RecordingShellConnector = new RecordingShellConnector();
    const session: DesktopSession = new DesktopSession({
        toolkit,
        settings: new ShellSettings(EMPTY_CONFIG, {}),
        accounts: new StaticAccountSource([]),
        processLauncher: new RecordingProcessLauncher(),
        env: {}
    });
    if (bound) session.shell = connector.shell_bind(1, 2);
    return { session, toolkit, connector };
}

afterEach((): void => {
    vi.restoreAllMocks();
});

describe('OutputRegistry', (): void => {
    it('registers outputs without chrome', (): void => {
        const { session, toolkit } = session_make();
        const output = session.outputs.output_add(7);
        expect(output).toEqual({ id: 7, transform: 0, scale: 1, activeUser: null, users: new Set<string>() });
        expect(toolkit.windowsCreated).toBe(0);
        expect(session.outputs.outputs_unbound().map((o) => o.id)).toEqual([7]);
    });

    it('refuses a duplicate output id', (): void => {
        const warn = vi.spyOn(console, 'warn').mockImplementation((): void => {});
        const { session } = session_make();
        session.outputs.output_add(7);
        expect(session.outputs.output_add(7)).toBeNull();
        expect(session.outputs.outputs_list()).toHaveLength(1);
        expect(warn).toHaveBeenCalledWith('[outputs] output 7 already registered, ignoring');
    });

    it('reports reuse when binding a cached pair', (): void => {
        const { session } = session_make();
        session.outputs.output_add(7);
        const bound: boolean[] = [];
        session.events.on(Events.SURFACES_BOUND, ({ reused }): void => {
            bound.push(reused);
        });

        expect(session.outputs.surfaces_bindForUser(7, 'Guest')).toEqual({ ok: true, reused: false });
        expect(session.outputs.surfaces_bindForUser(7, 'alice')).toEqual({ ok: true, reused: false });
        expect(session.outputs.surfaces_bindForUser(7, 'Guest')).toEqual({ ok: true, reused: true });
        expect(bound).toEqual([false, false, true]);
        expect(session.outputs.pairs_count(7)).toBe(2);
    });

    it('fails to bind without a shell or for an unknown output', (): void => {
        const { session } = session_make(false);
        session.outputs.output_add(7);
        expect(session.outputs.surfaces_bindForUser(7, 'Guest')).toEqual({ ok: false, error: 'shell not bound' });
        expect(session.outputs.surfaces_bindForUser(8, 'Guest')).toEqual({ ok: false, error: 'unknown output 8' });
    });

    it('destroys the panel when the background cannot be allocated', (): void => {
        const error = vi.spyOn(console, 'error').mockImplementation((): void => {});
        const { session, toolkit } = session_make();
        session.outputs.output_add(7);

        const realCreate = toolkit.window_create.bind(toolkit);
        let calls: number = 0;
        vi.spyOn(toolkit, 'window_create').mockImplementation((title: string) => {
            calls += 1;
            return calls === 2 ? null : realCreate(title);
        });

        expect(session.outputs.surfaces_bindForUser(7, 'Guest')).toEqual({ ok: false, error: 'surface allocation failed' });
        expect(toolkit.windows_list()).toEqual([]);
        expect(toolkit.timers_live()).toBe(0);
        expect(session.outputs.output_get(7)?.activeUser).toBeNull();
        expect(error).toHaveBeenCalledWith('[outputs] cannot allocate surfaces for Guest on output 7');
    });

    it('counts only active pairs toward allPainted', (): void => {
        const { session, toolkit } = session_make();
        session.outputs.output_add(7);
        session.outputs.output_add(8);
        session.outputs.surfaces_bindForUser(7, 'Guest');
        expect(session.outputs.allPainted()).toBe(false);

        const pair = session.outputs.activePair_get(7);
        pair?.panel.configure(0, 800, 600);
        pair?.background.configure(0, 800, 600);
        toolkit.frames_dispatch();
        expect(session.outputs.allPainted()).toBe(true);
    });

    it('finds the owner of a surface among cached pairs too', (): void => {
        const { session } = session_make();
        session.outputs.output_add(7);
        session.outputs.surfaces_bindForUser(7, 'Guest');
        session.outputs.surfaces_bindForUser(7, 'alice');

        const guest = session.outputs.pair_get(7, 'Guest');
        expect(session.outputs.surface_find(guest?.background.window.surfaceId ?? -1)).toBe(guest?.background);
        expect(session.outputs.surface_find(12345)).toBeUndefined();
    });

    it('tears everything down', (): void => {
        const { session, toolkit } = session_make();
        session.outputs.output_add(7);
        session.outputs.output_add(8);
        session.outputs.surfaces_bindForUser(7, 'Guest');
        session.outputs.surfaces_bindForUser(8, 'Guest');

        session.outputs.outputs_destroyAll();
        expect(session.outputs.outputs_list()).toEqual([]);
        expect(toolkit.windows_list()).toEqual([]);
    });
});

/**
 * @file Trace Replay
 *
 * Plays a YAML trace of compositor events and user input against a
 * headless session and records everything the shell sends back. Frames and
 * deferred tasks only run when the trace says so, which makes orderings
 * such as "unlock after the rebinding requests" visible in the transcript.
 *
 * Trace format:
 *   user: Guest                # optional initial user
 *   locking: true              # optional lock policy override
 *   accounts:                  # optional; unlock dialog entries
 *     - { username: alice, uid: 1001, shell: /bin/bash }
 *   config: { shell: {...}, launchers: [...] }   # optional
 *   steps:
 *     - event: { type: global-added, interface: wl_output, id: 7, version: 2 }
 *     - frame: true            # dispatch pending frames
 *     - tasks: true            # run deferred tasks
 *     - activate: alice        # click an unlock dialog entry
 *     - type: secret           # type into the password dialog
 *     - key: Return            # press a named key in the password dialog
 *     - menu: { output: 7, index: 0 }   # pick a user switcher menu entry
 *
 * @module shell/replay/TraceReplay
 */

import yaml from 'js-yaml';
import { z } from 'zod';
import type { LockState } from '../../desktop/types.js';
import type { NamedKey, WidgetHandle } from '../../toolkit/types.js';
import type { ShellConnector, ShellEvent, ShellProtocol, ShellRequest } from '../protocol/types.js';
import { RequestShellProtocol } from '../protocol/types.js';
import { ShellEventSchema } from '../protocol/schemas.js';
import { ShellConfigSchema } from '../../config/schemas.js';
import { ShellSettings } from '../../config/settings.js';
import { StaticAccountSource } from '../../accounts/passwd.js';
import { HeadlessToolkit, type HeadlessWidget, type HeadlessWindow } from '../../toolkit/HeadlessToolkit.js';
import { RecordingProcessLauncher } from '../../desktop/panel/ProcessLauncher.js';
import { DesktopSession } from '../../desktop/DesktopSession.js';
import { ShellStateMachine } from '../../desktop/ShellStateMachine.js';
import { Events } from '../../core/state/events.js';

// ─── Schema ──────────────────────────────────────────────────────────────────

const NamedKeySchema = z.enum(['Escape', 'Return', 'KP_Enter', 'BackSpace', 'Delete', 'Left', 'Right', 'Tab']);

const StepSchema = z.union([
    z.object({ event: ShellEventSchema }).strict(),
    z.object({ frame: z.literal(true) }).strict(),
    z.object({ tasks: z.literal(true) }).strict(),
    z.object({ activate: z.string().min(1) }).strict(),
    z.object({ type: z.string() }).strict(),
    z.object({ key: NamedKeySchema }).strict(),
    z.object({ menu: z.object({ output: z.number().int(), index: z.number().int().nonnegative() }) }).strict()
]);

export const TraceSchema = z.object({
    user: z.string().min(1).optional(),
    locking: z.boolean().optional(),
    accounts: z.array(z.object({
        username: z.string().min(1),
        uid: z.number().int(),
        shell: z.string()
    })).default([]),
    config: ShellConfigSchema.optional(),
    steps: z.array(StepSchema)
});

export type Trace = z.infer<typeof TraceSchema>;
export type TraceStep = z.infer<typeof StepSchema>;

// ─── Result ──────────────────────────────────────────────────────────────────

export type ReplayLine =
    | { kind: 'in'; event: ShellEvent }
    | { kind: 'out'; request: ShellRequest }
    | { kind: 'note'; message: string }
    | { kind: 'warning'; message: string };

export interface ReplayResult {
    transcript: ReplayLine[];
    requests: ShellRequest[];
    session: DesktopSession;
    machine: ShellStateMachine;
    toolkit: HeadlessToolkit;
}

/**
 * Parse and validate trace YAML.
 */
export function trace_parse(text: string): { ok: true; trace: Trace } | { ok: false; error: string } {
    let raw: unknown;
    try {
        raw = yaml.load(text);
    } catch (e: unknown) {
        return { ok: false, error: `YAML error: ${e instanceof Error ? e.message : String(e)}` };
    }
    const parsed = TraceSchema.safeParse(raw);
    if (!parsed.success) {
        const issues: string = parsed.error.issues
            .map((i): string => `${i.path.join('.') || '<root>'}: ${i.message}`)
            .join(', ');
        return { ok: false, error: `Invalid trace: ${issues}` };
    }
    return { ok: true, trace: parsed.data };
}

/**
 * Connector that appends every request to the transcript as it is sent.
 */
class TranscriptConnector implements ShellConnector {
    constructor(
        private readonly transcript: ReplayLine[],
        private readonly requests: ShellRequest[]
    ) {}

    shell_bind(): ShellProtocol {
        return new RequestShellProtocol((request: ShellRequest): void => {
            this.requests.push(request);
            this.transcript.push({ kind: 'out', request });
        });
    }
}

function headlessWidget_find(window: HeadlessWindow | undefined, widget: WidgetHandle): HeadlessWidget | undefined {
    return window?.widgets_list().find((w: HeadlessWidget): boolean => w === widget);
}

/**
 * Run a trace to completion.
 */
export function trace_replay(trace: Trace): ReplayResult {
    const transcript: ReplayLine[] = [];
    const requests: ShellRequest[] = [];
    const toolkit: HeadlessToolkit = new HeadlessToolkit();
    const session: DesktopSession = new DesktopSession({
        toolkit,
        settings: new ShellSettings(trace.config, {}),
        accounts: new StaticAccountSource(trace.accounts),
        processLauncher: new RecordingProcessLauncher(),
        username: trace.user,
        env: {},
        now: (): Date => new Date(0)
    });
    if (trace.locking !== undefined) session.locking = trace.locking;

    const machine: ShellStateMachine = new ShellStateMachine(session, new TranscriptConnector(transcript, requests));
    const note = (message: string): void => {
        transcript.push({ kind: 'note', message });
    };
    const warn = (message: string): void => {
        transcript.push({ kind: 'warning', message });
    };

    session.events.on(Events.DESKTOP_READY, ({ announced }): void => {
        note(announced ? 'desktop ready' : 'desktop ready (not announced)');
    });
    session.events.on(Events.LOCK_STATE_CHANGED, (state: LockState): void => note(`lock: ${state}`));
    session.events.on(Events.USER_SWITCHED, ({ username }): void => note(`user: ${username}`));

    const passwordWindow_get = (): HeadlessWindow | undefined => {
        const dialog = session.unlockDialog?.passwordDialog;
        return dialog ? toolkit.window_get(dialog.window.surfaceId) : undefined;
    };
    const key_send = (key: NamedKey): void => {
        const window: HeadlessWindow | undefined = passwordWindow_get();
        if (!window) {
            warn(`key ${key}: no password dialog`);
            return;
        }
        window.key_send({ name: key });
    };

    for (const step of trace.steps) {
        if ('event' in step) {
            transcript.push({ kind: 'in', event: step.event });
            machine.event_dispatch(step.event);
        } else if ('frame' in step) {
            toolkit.frames_dispatch();
        } else if ('tasks' in step) {
            toolkit.tasks_run();
        } else if ('activate' in step) {
            const dialog = session.unlockDialog;
            const entry = dialog?.entries.find((e): boolean => e.username === step.activate);
            const widget: HeadlessWidget | undefined = dialog && entry
                ? headlessWidget_find(toolkit.window_get(dialog.window.surfaceId), entry.widget)
                : undefined;
            if (!widget) {
                warn(`activate ${step.activate}: no such unlock entry`);
                continue;
            }
            widget.button_send('left', 'pressed');
            widget.button_send('left', 'released');
        } else if ('type' in step) {
            const window: HeadlessWindow | undefined = passwordWindow_get();
            if (!window) {
                warn('type: no password dialog');
                continue;
            }
            for (const ch of step.type) window.key_send({ name: 'char', text: ch });
        } else if ('key' in step) {
            key_send(step.key);
        } else {
            const panel = session.outputs.activePair_get(step.menu.output)?.panel;
            const widget: HeadlessWidget | undefined = panel
                ? headlessWidget_find(toolkit.window_get(panel.window.surfaceId), panel.switcher.widget)
                : undefined;
            if (!widget) {
                warn(`menu: no panel on output ${step.menu.output}`);
                continue;
            }
            widget.button_send('left', 'pressed');
            const menu = toolkit.menus[toolkit.menus.length - 1];
            if (!menu || step.menu.index >= menu.entries.length) {
                warn(`menu: no entry ${step.menu.index}`);
                continue;
            }
            menu.select(step.menu.index);
        }
    }

    return { transcript, requests, session, machine, toolkit };
}

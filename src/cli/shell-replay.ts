#!/usr/bin/env npx tsx
/**
 * @file Shell Trace Replay
 *
 * Replays a YAML trace of compositor events against a headless session and
 * prints the transcript of events in and requests out.
 *
 * Usage:
 *   npx tsx src/cli/shell-replay.ts traces/lock-and-switch.yaml
 *
 * @module
 */

import fs from 'fs';
import { trace_parse, trace_replay, type ReplayLine, type ReplayResult } from '../shell/replay/TraceReplay.js';
import { ShellPresenter } from '../shell/ui/ShellPresenter.js';

function line_format(line: ReplayLine): string {
    switch (line.kind) {
        case 'in': return ShellPresenter.event_format(line.event);
        case 'out': return ShellPresenter.request_format(line.request);
        case 'note': return ShellPresenter.info_format(line.message);
        case 'warning': return ShellPresenter.warning_format(line.message);
    }
}

function replay_main(args: string[]): number {
    const file: string | undefined = args[0];
    if (!file) {
        console.error('Usage: shell-replay <trace.yaml>');
        return 2;
    }

    let text: string;
    try {
        text = fs.readFileSync(file, 'utf-8');
    } catch (e: unknown) {
        console.error(ShellPresenter.error_format(`cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`));
        return 1;
    }

    const parsed = trace_parse(text);
    if (!parsed.ok) {
        console.error(ShellPresenter.error_format(parsed.error));
        return 1;
    }

    const result: ReplayResult = trace_replay(parsed.trace);
    result.transcript.forEach((line: ReplayLine): void => console.log(line_format(line)));
    result.machine.shutdown();
    return 0;
}

process.exitCode = replay_main(process.argv.slice(2));

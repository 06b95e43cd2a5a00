/**
 * @file Process Launcher
 *
 * Fire-and-forget process start for panel launchers. The shell never waits
 * on the child; its exit is only logged.
 *
 * @module desktop/panel/ProcessLauncher
 */

import { spawn, type ChildProcess } from 'child_process';

export interface LaunchCommand {
    argv: string[];
    env: Record<string, string>;
}

export interface ProcessLauncher {
    launch(command: LaunchCommand): void;
}

/**
 * Starts each command as a detached child with its own environment.
 */
export class DetachedProcessLauncher implements ProcessLauncher {
    public launch(command: LaunchCommand): void {
        const [file, ...args] = command.argv;
        if (!file) {
            console.warn('[launcher] empty command line, nothing to start');
            return;
        }

        let child: ChildProcess;
        try {
            child = spawn(file, args, { env: command.env, detached: true, stdio: 'ignore' });
        } catch (e: unknown) {
            console.error(`[launcher] spawn '${file}' failed: ${e instanceof Error ? e.message : String(e)}`);
            return;
        }

        child.on('error', (err: Error): void => {
            console.error(`[launcher] exec '${file}' failed: ${err.message}`);
        });
        child.on('exit', (code: number | null): void => {
            console.log(`[launcher] child ${child.pid ?? '?'} exited (${code ?? 'signal'})`);
        });
        child.unref();
    }
}

/**
 * Records commands instead of starting them. Used by trace replay and tests.
 */
export class RecordingProcessLauncher implements ProcessLauncher {
    public readonly launched: LaunchCommand[] = [];

    public launch(command: LaunchCommand): void {
        this.launched.push(command);
    }
}

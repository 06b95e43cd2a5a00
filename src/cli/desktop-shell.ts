#!/usr/bin/env npx tsx
/**
 * @file Desktop Shell Client
 *
 * Connects to a compositor bridge and runs the shell against the headless
 * toolkit, logging the protocol traffic.
 *
 * Usage:
 *   npx tsx src/cli/desktop-shell.ts
 *   npx tsx src/cli/desktop-shell.ts --url ws://localhost:8765/shell --config ./desktop-shell.yaml
 *
 * @module
 */

import { shellArgs_parse, type ShellCliOptions } from '../shell/cli/args.js';
import { config_load, type ConfigLoadResult } from '../config/loader.js';
import { ShellSettings } from '../config/settings.js';
import { PasswdAccountSource } from '../accounts/passwd.js';
import { HeadlessToolkit } from '../toolkit/HeadlessToolkit.js';
import { DetachedProcessLauncher } from '../desktop/panel/ProcessLauncher.js';
import { DesktopSession } from '../desktop/DesktopSession.js';
import { ShellStateMachine } from '../desktop/ShellStateMachine.js';
import { BridgeClient } from '../shell/client/BridgeClient.js';
import { ShellPresenter } from '../shell/ui/ShellPresenter.js';
import { Events } from '../core/state/events.js';
import type { ShellEvent, ShellRequest } from '../shell/protocol/types.js';

async function shell_start(options: ShellCliOptions): Promise<void> {
    const loaded: ConfigLoadResult = config_load(options.config);
    if (loaded.error) console.warn(ShellPresenter.warning_format(loaded.error));
    console.log(ShellPresenter.info_format(
        loaded.source === 'file' ? `config: ${options.config}` : 'config: defaults'
    ));

    const settings: ShellSettings = new ShellSettings(loaded.config);
    const session: DesktopSession = new DesktopSession({
        toolkit: new HeadlessToolkit({ scheduling: 'event-loop' }),
        settings,
        accounts: new PasswdAccountSource(),
        processLauncher: new DetachedProcessLauncher(),
        username: options.user
    });
    console.log(ShellPresenter.info_format(`locking: ${session.locking} (${settings.locking_source()})`));

    const client: BridgeClient = new BridgeClient({ url: options.url });
    const machine: ShellStateMachine = new ShellStateMachine(session, client);

    session.events.on(Events.DESKTOP_READY, ({ announced }): void => {
        console.log(ShellPresenter.info_format(announced ? 'desktop ready' : 'desktop ready (not announced)'));
    });
    session.events.on(Events.LOCK_STATE_CHANGED, (state): void => {
        console.log(ShellPresenter.info_format(`lock: ${state}`));
    });
    session.events.on(Events.USER_SWITCHED, ({ username }): void => {
        console.log(ShellPresenter.info_format(`user: ${username}`));
    });

    client.onEvent = (event: ShellEvent): void => {
        console.log(ShellPresenter.event_format(event));
        machine.event_dispatch(event);
    };
    client.onRequest = (request: ShellRequest): void => {
        console.log(ShellPresenter.request_format(request));
    };

    await client.connect();
    console.log(ShellPresenter.info_format(`connected to ${client.url}`));

    client.onClose = (): void => {
        console.log(ShellPresenter.info_format('bridge closed'));
        machine.shutdown();
        process.exit(0);
    };

    process.on('SIGINT', (): void => {
        machine.shutdown();
        client.disconnect();
        process.exit(0);
    });
}

// ─── Main ──────────────────────────────────────────────────────────────────

shell_start(shellArgs_parse(process.argv.slice(2))).catch((e: unknown) => {
    console.error(ShellPresenter.error_format(`Fatal error: ${e instanceof Error ? e.message : String(e)}`));
    process.exit(1);
});

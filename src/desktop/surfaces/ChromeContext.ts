/**
 * @file Chrome Context
 *
 * What a panel or background needs from the session to build itself.
 *
 * @module desktop/surfaces/ChromeContext
 */

import type { Toolkit } from '../../toolkit/types.js';
import type { EnvSource, ShellSettings } from '../../config/settings.js';
import type { EventEmitter } from '../../core/state/events.js';
import type { ProcessLauncher } from '../panel/ProcessLauncher.js';

export interface ChromeContext {
    toolkit: Toolkit;
    settings: ShellSettings;
    processLauncher: ProcessLauncher;
    events: EventEmitter;
    /** Environment inherited by launched processes. */
    env: EnvSource;
    now: () => Date;
}

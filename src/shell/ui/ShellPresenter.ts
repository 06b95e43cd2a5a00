/**
 * @file Shell Presenter
 *
 * Formatting for the CLI transcript: compositor events coming in, protocol
 * requests going out, and session notices.
 *
 * @module shell/ui/ShellPresenter
 */

import chalk from 'chalk';
import type { ShellEvent, ShellRequest } from '../protocol/types.js';

/**
 * Markers for each transcript line kind.
 */
export const MARKERS = {
    IN: '<-',
    OUT: '->',
    INFO: '○',
    WARNING: '>> WARNING:',
    ERROR: '>> ERROR:'
};

/**
 * Plain `key=value` rendering of every field except the discriminant.
 */
function fields_describe(record: object, skip: string): string {
    return Object.entries(record)
        .filter(([key]): boolean => key !== skip)
        .map(([key, value]): string => `${key}=${String(value)}`)
        .join(' ');
}

export class ShellPresenter {
    /** `set_panel output=7 surface=100` */
    static request_describe(request: ShellRequest): string {
        const fields: string = fields_describe(request, 'request');
        return fields ? `${request.request} ${fields}` : request.request;
    }

    /** `global-added interface=wl_output id=7 version=1` */
    static event_describe(event: ShellEvent): string {
        const fields: string = fields_describe(event, 'type');
        return fields ? `${event.type} ${fields}` : event.type;
    }

    static request_format(request: ShellRequest): string {
        return chalk.cyan(`${MARKERS.OUT} ${this.request_describe(request)}`);
    }

    static event_format(event: ShellEvent): string {
        return chalk.white(`${MARKERS.IN} ${this.event_describe(event)}`);
    }

    static info_format(message: string): string {
        return chalk.gray(`${MARKERS.INFO} ${message}`);
    }

    static warning_format(message: string): string {
        return chalk.yellow(`${MARKERS.WARNING} ${message}`);
    }

    static error_format(message: string): string {
        return chalk.red(`${MARKERS.ERROR} ${message}`);
    }
}

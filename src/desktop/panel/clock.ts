/**
 * @file Panel Clock
 *
 * Minute-resolution clock label on the panel. Redraws once a minute.
 *
 * @module desktop/panel/clock
 */

import type { TimerStop, Toolkit, WidgetHandle } from '../../toolkit/types.js';

const CLOCK_INTERVAL_MS: number = 60_000;
const DAYS: readonly string[] = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS: readonly string[] = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/**
 * Format a time as `Mon Jan 05, 09:07 AM` (local time).
 */
export function clockLabel_format(date: Date): string {
    const hours24: number = date.getHours();
    const hours12: number = hours24 % 12 === 0 ? 12 : hours24 % 12;
    const pad = (n: number): string => String(n).padStart(2, '0');
    const meridiem: string = hours24 < 12 ? 'AM' : 'PM';
    return `${DAYS[date.getDay()]} ${MONTHS[date.getMonth()]} ${pad(date.getDate())}, ${pad(hours12)}:${pad(date.getMinutes())} ${meridiem}`;
}

export class PanelClock {
    public readonly widget: WidgetHandle;
    public label: string = '';
    private readonly timerStop: TimerStop;

    constructor(parent: WidgetHandle, toolkit: Toolkit, private readonly now: () => Date) {
        this.widget = parent.child_add({
            redraw: (): void => {
                this.label = clockLabel_format(this.now());
            }
        });
        this.timerStop = toolkit.timer_start(CLOCK_INTERVAL_MS, (): void => this.widget.redraw_schedule());
    }

    public destroy(): void {
        this.timerStop();
        this.widget.destroy();
    }
}

/**
 * @file Shell Bridge Client
 *
 * WebSocket transport between a compositor bridge and the shell state
 * machine. Inbound frames are compositor events, validated with
 * `ShellEventSchema` before anything else sees them; malformed frames are
 * answered with an `error` frame and dropped. Outbound protocol calls go out
 * as `request` frames.
 *
 * Frames:
 *   bridge -> client   { type: 'global-added', ... } and the other events
 *   client -> bridge   { type: 'bind', id, version }
 *                      { type: 'request', request: 'set_panel', ... }
 *                      { type: 'error', message }
 *
 * @module shell/client/BridgeClient
 */

import WebSocket from 'ws';
import type { ShellConnector, ShellEvent, ShellProtocol, ShellRequest } from '../protocol/types.js';
import { RequestShellProtocol } from '../protocol/types.js';
import { ShellEventSchema } from '../protocol/schemas.js';

export const DEFAULT_BRIDGE_URL: string = 'ws://localhost:8765/shell';

export interface BridgeClientOptions {
    url?: string;
    env?: Record<string, string | undefined>;
}

export type BridgeFrame =
    | { type: 'bind'; id: number; version: number }
    | ({ type: 'request' } & ShellRequest)
    | { type: 'error'; message: string };

/**
 * Resolve the bridge URL: explicit option, then DESKTOP_SHELL_URL, then the
 * local default.
 */
export function bridgeUrl_resolve(options: BridgeClientOptions = {}): string {
    const env: Record<string, string | undefined> = options.env ?? process.env;
    return options.url || env['DESKTOP_SHELL_URL'] || DEFAULT_BRIDGE_URL;
}

export class BridgeClient implements ShellConnector {
    private ws: WebSocket | null = null;
    public readonly url: string;

    /** Receives every validated compositor event. */
    public onEvent: ((event: ShellEvent) => void) | null = null;
    public onClose: (() => void) | null = null;
    /** Sees every outbound request before it is sent. */
    public onRequest: ((request: ShellRequest) => void) | null = null;

    constructor(options: BridgeClientOptions = {}) {
        this.url = bridgeUrl_resolve(options);
    }

    /**
     * Connect to the bridge endpoint.
     */
    async connect(): Promise<void> {
        return new Promise((resolve, reject): void => {
            const ws: WebSocket = new WebSocket(this.url);
            let opened: boolean = false;

            ws.on('open', (): void => {
                opened = true;
                resolve();
            });

            ws.on('error', (err: Error): void => {
                if (!opened) {
                    reject(new Error(`Connection failed: ${err.message}`));
                    return;
                }
                console.error(`[bridge] socket error: ${err.message}`);
            });

            this.socket_attach(ws);
        });
    }

    /**
     * Take over an already-created socket: route its messages into
     * `onEvent` and forget it on close.
     */
    public socket_attach(ws: WebSocket): void {
        this.ws = ws;

        ws.on('message', (data: Buffer | string): void => {
            this.frame_receive(typeof data === 'string' ? data : data.toString());
        });

        ws.on('close', (): void => {
            if (this.ws === ws) this.ws = null;
            this.onClose?.();
        });
    }

    disconnect(): void {
        if (this.ws) {
            this.ws.close();
            this.ws = null;
        }
    }

    get connected(): boolean {
        return this.ws !== null && this.ws.readyState === this.ws.OPEN;
    }

    /**
     * Bind the shell global over the bridge. Requests from the returned
     * protocol become `request` frames.
     */
    shell_bind(globalId: number, version: number): ShellProtocol {
        this.frame_send({ type: 'bind', id: globalId, version });
        return new RequestShellProtocol((request: ShellRequest): void => {
            this.onRequest?.(request);
            this.frame_send({ type: 'request', ...request });
        });
    }

    private frame_send(frame: BridgeFrame): void {
        if (!this.ws || this.ws.readyState !== this.ws.OPEN) {
            console.warn(`[bridge] not connected, dropping ${frame.type} frame`);
            return;
        }
        this.ws.send(JSON.stringify(frame));
    }

    private frame_receive(text: string): void {
        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch {
            this.frame_send({ type: 'error', message: 'Invalid JSON' });
            return;
        }

        const parsed = ShellEventSchema.safeParse(raw);
        if (!parsed.success) {
            this.frame_send({
                type: 'error',
                message: `Invalid event: ${parsed.error.issues.map((i) => i.message).join(', ')}`
            });
            return;
        }

        try {
            this.onEvent?.(parsed.data);
        } catch (e) {
            const reason: string = e instanceof Error ? e.message : String(e);
            console.error(`[bridge] event handler failed: ${reason}`);
        }
    }
}

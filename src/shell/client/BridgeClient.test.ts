import { describe, it, expect, vi, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import type { WebSocket } from 'ws';
import { BridgeClient, bridgeUrl_resolve, DEFAULT_BRIDGE_URL } from './BridgeClient.js';
import type { ShellEvent } from '../protocol/types.js';

interface CapturedFrame {
    type: string;
    [key: string]: unknown;
}

class MockWebSocket extends EventEmitter {
    public OPEN: number = 1;
    public readyState: number = 1;
    public sent: string[] = [];

    send(payload: string): void {
        this.sent.push(payload);
    }

    close(): void {
        this.readyState = 3;
        this.emit('close');
    }
}

function sentFrames_parse(ws: MockWebSocket): CapturedFrame[] {
    return ws.sent.map((payload: string): CapturedFrame => JSON.parse(payload) as CapturedFrame);
}

function client_attach(): { client: BridgeClient; ws: MockWebSocket; events: ShellEvent[] } {
    const client: BridgeClient = new BridgeClient({ url: 'ws://bridge.test/shell' });
    const ws: MockWebSocket = new MockWebSocket();
    const events: ShellEvent[] = [];
    client.onEvent = (event: ShellEvent): void => {
        events.push(event);
    };
    client.socket_attach(ws as unknown as WebSocket);
    return { client, ws, events };
}

afterEach((): void => {
    vi.restoreAllMocks();
});

describe('BridgeClient inbound frames', (): void => {
    it('hands validated events to onEvent', (): void => {
        const { ws, events } = client_attach();
        ws.emit('message', Buffer.from(JSON.stringify({ type: 'global-added', interface: 'wl_output', id: 7, version: 2 })));
        ws.emit('message', JSON.stringify({ type: 'prepare-lock' }));

        expect(events).toEqual([
            { type: 'global-added', interface: 'wl_output', id: 7, version: 2 },
            { type: 'prepare-lock' }
        ]);
        expect(ws.sent).toEqual([]);
    });

    it('answers malformed JSON with an error frame', (): void => {
        const { ws, events } = client_attach();
        ws.emit('message', Buffer.from('{not json'));

        expect(events).toEqual([]);
        expect(sentFrames_parse(ws)).toEqual([{ type: 'error', message: 'Invalid JSON' }]);
    });

    it('answers events that fail validation with an error frame', (): void => {
        const { ws, events } = client_attach();
        ws.emit('message', Buffer.from(JSON.stringify({ type: 'user-switched', username: 42 })));

        expect(events).toEqual([]);
        const frames: CapturedFrame[] = sentFrames_parse(ws);
        expect(frames).toHaveLength(1);
        expect(frames[0]?.type).toBe('error');
        expect(String(frames[0]?.message).startsWith('Invalid event: ')).toBe(true);
    });

    it('logs a failing handler and keeps going', (): void => {
        const error = vi.spyOn(console, 'error').mockImplementation((): void => {});
        const { client, ws } = client_attach();
        client.onEvent = (): void => {
            throw new Error('boom');
        };
        ws.emit('message', JSON.stringify({ type: 'prepare-lock' }));
        expect(error).toHaveBeenCalledWith('[bridge] event handler failed: boom');
    });
});

describe('BridgeClient outbound frames', (): void => {
    it('sends a bind frame and turns protocol calls into request frames', (): void => {
        const { client, ws } = client_attach();
        const seen: string[] = [];
        client.onRequest = (request): void => {
            seen.push(request.request);
        };

        const shell = client.shell_bind(1, 2);
        shell.panel_set(7, 101);
        shell.user_switch('alice');
        shell.desktop_ready();

        expect(sentFrames_parse(ws)).toEqual([
            { type: 'bind', id: 1, version: 2 },
            { type: 'request', request: 'set_panel', output: 7, surface: 101 },
            { type: 'request', request: 'switch_user', username: 'alice' },
            { type: 'request', request: 'desktop_ready' }
        ]);
        expect(seen).toEqual(['set_panel', 'switch_user', 'desktop_ready']);
    });

    it('drops frames once the socket has closed', (): void => {
        const warn = vi.spyOn(console, 'warn').mockImplementation((): void => {});
        const { client, ws } = client_attach();
        let closed: number = 0;
        client.onClose = (): void => {
            closed += 1;
        };

        ws.close();
        expect(closed).toBe(1);
        expect(client.connected).toBe(false);

        client.shell_bind(1, 2).unlock();
        expect(ws.sent).toEqual([]);
        expect(warn).toHaveBeenCalledWith('[bridge] not connected, dropping request frame');
    });
});

describe('bridgeUrl_resolve', (): void => {
    it('prefers the explicit URL, then the environment, then the default', (): void => {
        const env = { DESKTOP_SHELL_URL: 'ws://env.test/shell' };
        expect(bridgeUrl_resolve({ url: 'ws://flag.test/shell', env })).toBe('ws://flag.test/shell');
        expect(bridgeUrl_resolve({ env })).toBe('ws://env.test/shell');
        expect(bridgeUrl_resolve({ env: {} })).toBe(DEFAULT_BRIDGE_URL);
    });
});

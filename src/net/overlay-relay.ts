import type http from 'node:http';
import type { IncomingMessage } from 'node:http';
import type { Socket } from 'node:net';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { joinTranslated } from '../captions/caption-store';
import { debugLog, warnLog } from '../env/logging';
import type { CaptionSink } from '../sinks/caption-sink';
import type {
	OverlayCaptionsMessage,
	OverlayHello,
	OverlayProgressMessage,
	OverlayRelayOptions,
	OverlayRole,
} from './overlay-protocol';

const DEFAULT_PATH = '/ws/overlay';

// Anything with send/close; a ws WebSocket qualifies.
export interface OverlayClient {
	send(payload: string): void;
	close(code?: number, reason?: string): void;
}

export interface OverlayConnection {
	onMessage(raw: string): void;
	onClose(): void;
	role(): OverlayRole | null;
}

export interface OverlayRelay extends CaptionSink {
	attach(server: http.Server): void;
	accept(client: OverlayClient): OverlayConnection;
	publishProgress(progress: Omit<OverlayProgressMessage, 'type' | 'ts'>): void;
	getConnectedOverlays(): number;
	close(): void;
}

function rawToString(data: RawData): string | null {
	if (typeof data === 'string') return data;
	if (Buffer.isBuffer(data)) return data.toString('utf8');
	if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
	return Buffer.from(data).toString('utf8');
}

function parseHello(raw: string): OverlayHello | null {
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch {
		return null;
	}
	if (!parsed || typeof parsed !== 'object' || !('type' in parsed) || parsed.type !== 'hello') return null;
	const role = 'role' in parsed && parsed.role === 'overlay' ? 'overlay' : 'controller';
	const token = 'token' in parsed && typeof parsed.token === 'string' ? parsed.token : undefined;
	return token === undefined ? { type: 'hello', role } : { type: 'hello', role, token };
}

/**
 * Relays caption windows and teleprompter progress to overlay clients.
 * Overlays say hello first; until then they receive nothing.
 */
export function createOverlayRelay(options?: OverlayRelayOptions): OverlayRelay {
	const upgradePath = options?.path || DEFAULT_PATH;
	const overlays = new Set<OverlayClient>();
	const controllers = new Set<OverlayClient>();
	const wss = new WebSocketServer({ noServer: true });
	let attachedServer: http.Server | null = null;
	let lastCaptions: string | null = null;
	let lastProgress: string | null = null;

	const sendSafe = (client: OverlayClient, payload: string) => {
		try {
			client.send(payload);
		} catch (err) {
			// close events clean up dead clients
			debugLog('[overlay-relay] send failed', err);
		}
	};

	const broadcast = (payload: string) => {
		for (const client of overlays) sendSafe(client, payload);
	};

	const broadcastStatus = () => {
		const payload = JSON.stringify({ type: 'overlay-status', connected: overlays.size });
		for (const client of controllers) sendSafe(client, payload);
	};

	const handleHandshake = (client: OverlayClient, raw: string): OverlayRole | null => {
		const hello = parseHello(raw);
		if (!hello) {
			client.close(1002, 'expected hello');
			return null;
		}
		const role = hello.role ?? 'controller';
		if (role === 'overlay') {
			if (options?.token && hello.token !== options.token) {
				client.close(4003, 'invalid token');
				return null;
			}
			overlays.add(client);
			if (lastCaptions) sendSafe(client, lastCaptions);
			if (lastProgress) sendSafe(client, lastProgress);
			broadcastStatus();
		} else {
			controllers.add(client);
			sendSafe(client, JSON.stringify({ type: 'overlay-status', connected: overlays.size }));
		}
		return role;
	};

	const accept = (client: OverlayClient): OverlayConnection => {
		let role: OverlayRole | null = null;
		return {
			onMessage(raw: string) {
				if (role) return; // overlays and controllers only listen after the hello
				role = handleHandshake(client, raw);
			},
			onClose() {
				if (role === 'overlay') {
					overlays.delete(client);
					broadcastStatus();
				} else if (role === 'controller') {
					controllers.delete(client);
				}
				role = null;
			},
			role: () => role,
		};
	};

	const handleWsConnection = (ws: WebSocket) => {
		const conn = accept(ws);
		ws.on('message', (data: RawData) => {
			const payload = rawToString(data);
			if (payload) conn.onMessage(payload);
		});
		ws.on('close', () => conn.onClose());
		ws.on('error', () => conn.onClose());
	};

	const handleUpgrade = (req: IncomingMessage, socket: Socket, head: Buffer) => {
		const path = (req.url || '').split('?')[0] || '/';
		if (path !== upgradePath) {
			socket.destroy();
			return;
		}
		wss.handleUpgrade(req, socket, head, (ws) => {
			handleWsConnection(ws);
		});
	};

	return {
		attach(server: http.Server) {
			if (attachedServer === server) return;
			attachedServer?.off('upgrade', handleUpgrade);
			attachedServer = server;
			server.on('upgrade', handleUpgrade);
			debugLog('[overlay-relay] attached', { path: upgradePath });
		},
		accept,
		publish(lines) {
			const message: OverlayCaptionsMessage = {
				type: 'captions',
				lines: [...lines],
				text: joinTranslated(lines),
				ts: Date.now(),
			};
			lastCaptions = JSON.stringify(message);
			broadcast(lastCaptions);
		},
		clear() {
			const message: OverlayCaptionsMessage = { type: 'captions', lines: [], text: '', ts: Date.now() };
			lastCaptions = JSON.stringify(message);
			broadcast(lastCaptions);
		},
		publishProgress(progress) {
			const message: OverlayProgressMessage = { type: 'progress', ...progress, ts: Date.now() };
			lastProgress = JSON.stringify(message);
			broadcast(lastProgress);
		},
		getConnectedOverlays: () => overlays.size,
		close() {
			attachedServer?.off('upgrade', handleUpgrade);
			attachedServer = null;
			for (const client of [...overlays, ...controllers]) {
				try {
					client.close(1001, 'relay closed');
				} catch (err) {
					warnLog('[overlay-relay] close failed', err);
				}
			}
			overlays.clear();
			controllers.clear();
			wss.close();
		},
	};
}

import {
	type ChatClient,
	type ChatMessage,
	errorMessage,
	type Logger,
	log as defaultLog,
} from "@crowdmove/core";
import { parseIrcLine, toChatMessage } from "./irc";
import { type ChatSocket, createWsSocket, type SocketFactory } from "./socket";

export const DEFAULT_IRC_URL = "wss://irc-ws.chat.twitch.tv:443";

export type TwitchChatOptions = {
	channel: string;
	nick: string;
	oauthToken: string;
	url?: string;
	socketFactory?: SocketFactory;
	openTimeoutMs?: number;
	reconnectMs?: number;
	/** Oldest messages are dropped past this many. */
	bufferLimit?: number;
	log?: Logger;
};

const DEFAULT_OPEN_TIMEOUT_MS = 15_000;
const DEFAULT_RECONNECT_MS = 5_000;
const DEFAULT_BUFFER_LIMIT = 10_000;

const normalizeChannel = (channel: string) =>
	`#${channel.trim().replace(/^#/, "").toLowerCase()}`;

const normalizeToken = (token: string) =>
	token.startsWith("oauth:") ? token : `oauth:${token}`;

/**
 * Read-only Twitch chat over IRC on WebSocket. Lines are buffered as they
 * arrive and drained by `pollMessages`.
 */
export class TwitchChatClient implements ChatClient {
	private readonly channel: string;
	private readonly nick: string;
	private readonly oauthToken: string;
	private readonly url: string;
	private readonly socketFactory: SocketFactory;
	private readonly openTimeoutMs: number;
	private readonly reconnectMs: number;
	private readonly bufferLimit: number;
	private readonly log: Logger;
	private readonly buffer: ChatMessage[] = [];
	private socket: ChatSocket | null = null;
	private pendingSocket: ChatSocket | null = null;
	private closedByClient = false;
	private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
	private dropped = 0;

	constructor(options: TwitchChatOptions) {
		this.channel = normalizeChannel(options.channel);
		this.nick = options.nick.trim().toLowerCase();
		this.oauthToken = normalizeToken(options.oauthToken.trim());
		this.url = options.url ?? DEFAULT_IRC_URL;
		this.socketFactory = options.socketFactory ?? createWsSocket;
		this.openTimeoutMs = options.openTimeoutMs ?? DEFAULT_OPEN_TIMEOUT_MS;
		this.reconnectMs = options.reconnectMs ?? DEFAULT_RECONNECT_MS;
		this.bufferLimit = options.bufferLimit ?? DEFAULT_BUFFER_LIMIT;
		this.log = options.log ?? defaultLog;
	}

	get connected() {
		return this.socket !== null;
	}

	get droppedMessages() {
		return this.dropped;
	}

	/** Opens the socket and joins the channel; rejects on timeout or error. */
	async connect(): Promise<void> {
		this.closedByClient = false;
		try {
			await this.open();
		} catch (error) {
			this.scheduleReconnect();
			throw error;
		}
	}

	pollMessages(maxCount: number): ChatMessage[] {
		return this.buffer.splice(0, Math.max(0, maxCount));
	}

	close() {
		this.closedByClient = true;
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = null;
		}
		const sockets = [this.socket, this.pendingSocket];
		this.socket = null;
		this.pendingSocket = null;
		for (const socket of sockets) socket?.close();
	}

	private open(): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			let settled = false;
			let timer: ReturnType<typeof setTimeout> | undefined;
			const settle = (error?: Error) => {
				if (settled) return;
				settled = true;
				clearTimeout(timer);
				if (this.pendingSocket === socket) this.pendingSocket = null;
				if (error) reject(error);
				else resolve();
			};

			const socket = this.socketFactory(this.url, {
				onOpen: () => {
					if (this.closedByClient) {
						socket.close();
						settle(new Error("Chat client was closed."));
						return;
					}
					this.socket = socket;
					this.login(socket);
					this.log("info", "chat_connected", { channel: this.channel });
					settle();
				},
				onMessage: (text) => this.handleData(socket, text),
				onClose: () => {
					settle(new Error("Chat socket closed before opening."));
					this.handleClose(socket);
				},
				onError: (error) => {
					this.log("warn", "chat_socket_error", {
						error: errorMessage(error),
					});
					settle(error);
				},
			});

			this.pendingSocket = socket;
			timer = setTimeout(() => {
				if (settled) return;
				socket.close();
				settle(new Error("Timed out opening chat socket."));
			}, this.openTimeoutMs);
		});
	}

	private login(socket: ChatSocket) {
		socket.send(`PASS ${this.oauthToken}`);
		socket.send(`NICK ${this.nick}`);
		socket.send(`JOIN ${this.channel}`);
	}

	private handleData(socket: ChatSocket, data: string) {
		for (const line of data.split(/\r?\n/)) {
			if (!line) continue;
			const message = parseIrcLine(line);
			if (!message) continue;

			switch (message.command) {
				case "PING":
					socket.send(`PONG :${message.trailing ?? "tmi.twitch.tv"}`);
					break;
				case "RECONNECT":
					this.log("info", "chat_reconnect_requested", {});
					socket.close();
					break;
				case "NOTICE":
					this.log("warn", "chat_notice", { notice: message.trailing });
					break;
				case "PRIVMSG": {
					const chat = toChatMessage(message);
					if (chat) this.push(chat);
					break;
				}
				default:
					break;
			}
		}
	}

	private push(message: ChatMessage) {
		this.buffer.push(message);
		if (this.buffer.length > this.bufferLimit) {
			this.buffer.shift();
			this.dropped += 1;
		}
	}

	private handleClose(socket: ChatSocket) {
		if (this.socket === socket) this.socket = null;
		if (this.closedByClient) return;
		this.log("warn", "chat_disconnected", { channel: this.channel });
		this.scheduleReconnect();
	}

	private scheduleReconnect() {
		if (this.closedByClient || this.reconnectTimer) return;
		this.reconnectTimer = setTimeout(() => {
			this.reconnectTimer = null;
			if (this.closedByClient) return;
			this.open().catch((error) => {
				if (this.closedByClient) return;
				this.log("warn", "chat_reconnect_failed", {
					error: errorMessage(error),
				});
				this.scheduleReconnect();
			});
		}, this.reconnectMs);
	}
}

import WebSocket from "ws";

export type ChatSocketHandlers = {
	onOpen: () => void;
	onMessage: (text: string) => void;
	onClose: () => void;
	onError: (error: Error) => void;
};

export type ChatSocket = {
	send: (text: string) => void;
	close: () => void;
};

export type SocketFactory = (
	url: string,
	handlers: ChatSocketHandlers,
) => ChatSocket;

export const createWsSocket: SocketFactory = (url, handlers) => {
	const ws = new WebSocket(url);
	ws.on("open", handlers.onOpen);
	ws.on("message", (raw: WebSocket.RawData) => {
		handlers.onMessage(raw.toString());
	});
	ws.on("close", handlers.onClose);
	ws.on("error", handlers.onError);
	return {
		send: (text) => ws.send(text),
		close: () => ws.terminate(),
	};
};

export {
	DEFAULT_IRC_URL,
	TwitchChatClient,
	type TwitchChatOptions,
} from "./client";
export { type IrcMessage, parseIrcLine, toChatMessage } from "./irc";
export {
	type ChatSocket,
	type ChatSocketHandlers,
	createWsSocket,
	type SocketFactory,
} from "./socket";

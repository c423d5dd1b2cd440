import type { Result } from "./result";

export type Color = "white" | "black";

export type Game = {
	id: string;
	color: Color;
	/** Absent when the opponent is the server's AI. */
	opponentId?: string;
	isMyTurn: boolean;
	positionNotation: string;
};

export type Challenge = {
	id: string;
	rated: boolean;
	challengerId: string | null;
	variant: string;
};

export type HostingEvent =
	| { type: "challenge"; challenge: Challenge }
	| { type: "gameStart"; gameId: string }
	| { type: "gameFinish"; gameId: string }
	| { type: "other"; name: string };

export type AccountTotals = {
	win: number;
	draw: number;
	loss: number;
};

export type ChatMessage = {
	username: string;
	text: string;
};

export interface HostingClient {
	listActiveGames(): Promise<Result<Game[]>>;
	makeMove(gameId: string, move: string): Promise<Result<void>>;
	resign(gameId: string): Promise<Result<void>>;
	acceptChallenge(challengeId: string): Promise<Result<void>>;
	declineChallenge(challengeId: string, reason?: string): Promise<Result<void>>;
	getOpponentOnlineStatus(userId: string): Promise<Result<boolean>>;
	getAccountTotals(): Promise<Result<AccountTotals>>;
	getLastGameId(): Promise<Result<string | null>>;
	/**
	 * Infinite stream of account events. Throws when the connection drops;
	 * consumers reconnect by calling it again.
	 */
	streamEvents(signal?: AbortSignal): AsyncIterable<HostingEvent>;
}

export interface ChatClient {
	/** Never blocks; returns an empty array when nothing arrived. */
	pollMessages(maxCount: number): ChatMessage[];
}

import type { RouteTable } from "./routes";

export type ClientLogEvent = {
	type: "request" | "response" | "stream";
	message: string;
	details?: Record<string, unknown>;
};

export type LichessClientOptions = {
	token: string;
	baseUrl?: string;
	/** Bound on every request except the event stream. */
	timeoutMs?: number;
	/** Reopen the event stream after this long without a byte. */
	streamIdleMs?: number;
	routeOverrides?: Partial<RouteTable>;
	fetchImpl?: typeof fetch;
	onLog?: (event: ClientLogEvent) => void;
};

export type LichessAccount = {
	id: string;
	username: string;
	title: string | null;
	totals: { win: number; draw: number; loss: number };
};

export type CreateChallengeOptions = {
	rated?: boolean;
	clockLimitSeconds?: number;
	clockIncrementSeconds?: number;
};

export type CreatedChallenge = {
	id: string;
	url: string | null;
};

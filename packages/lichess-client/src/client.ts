import {
	type AccountTotals,
	type Challenge,
	type Game,
	type HostingClient,
	type HostingEvent,
	ok,
	okVoid,
	type Result,
} from "@crowdmove/core";
import { z } from "zod";
import {
	errorMessageFromBody,
	InvalidResponseError,
	LichessHttpError,
	toFailure,
} from "./errors";
import { parseLine, readNdjson } from "./ndjson";
import { createRouteResolver, type RouteKey, type RouteParams } from "./routes";
import type {
	ClientLogEvent,
	CreateChallengeOptions,
	CreatedChallenge,
	LichessAccount,
	LichessClientOptions,
} from "./types";

const accountSchema = z
	.object({
		id: z.string(),
		username: z.string(),
		title: z.string().optional(),
		count: z
			.object({
				win: z.number().int(),
				draw: z.number().int(),
				loss: z.number().int(),
			})
			.passthrough(),
	})
	.passthrough();

const nowPlayingSchema = z
	.object({
		nowPlaying: z.array(
			z
				.object({
					gameId: z.string(),
					color: z.enum(["white", "black"]),
					fen: z.string(),
					isMyTurn: z.boolean(),
					opponent: z
						.object({
							id: z.string().nullable().optional(),
							username: z.string().optional(),
							ai: z.number().int().optional(),
						})
						.passthrough(),
				})
				.passthrough(),
		),
	})
	.passthrough();

const usersStatusSchema = z.array(
	z
		.object({
			id: z.string(),
			name: z.string().optional(),
			online: z.boolean().optional(),
		})
		.passthrough(),
);

const exportedGameSchema = z.object({ id: z.string() }).passthrough();

const challengeSchema = z
	.object({
		id: z.string(),
		url: z.string().optional(),
		rated: z.boolean(),
		challenger: z
			.object({ id: z.string() })
			.passthrough()
			.nullable()
			.optional(),
		variant: z.object({ key: z.string() }).passthrough(),
	})
	.passthrough();

const wrappedChallengeSchema = z
	.object({ challenge: challengeSchema })
	.passthrough();

const gameRefSchema = z
	.object({
		gameId: z.string().optional(),
		id: z.string().optional(),
	})
	.passthrough();

const eventSchema = z.discriminatedUnion("type", [
	z.object({ type: z.literal("challenge"), challenge: challengeSchema }),
	z.object({ type: z.literal("gameStart"), game: gameRefSchema }),
	z.object({ type: z.literal("gameFinish"), game: gameRefSchema }),
]);

const eventTypeSchema = z.object({ type: z.string() }).passthrough();

type Method = "GET" | "POST";

type RequestOptions = {
	method?: Method;
	form?: Record<string, string>;
	query?: Record<string, string>;
	accept?: string;
	signal?: AbortSignal;
	/** Drop the default timeout, for long-lived streams. */
	stream?: boolean;
};

const trimSlash = (value: string) => value.replace(/\/+$/, "");

export const DEFAULT_BASE_URL = "https://lichess.org";
export const DEFAULT_TIMEOUT_MS = 10_000;
/** Lichess sends a keep-alive newline every few seconds. */
export const DEFAULT_STREAM_IDLE_MS = 20_000;

const toChallenge = (raw: z.infer<typeof challengeSchema>): Challenge => ({
	id: raw.id,
	rated: raw.rated,
	challengerId: raw.challenger?.id ?? null,
	variant: raw.variant.key,
});

/** Maps one event-stream line; null when it is not an event at all. */
export const toHostingEvent = (raw: unknown): HostingEvent | null => {
	const typed = eventTypeSchema.safeParse(raw);
	if (!typed.success) return null;
	const parsed = eventSchema.safeParse(raw);
	if (!parsed.success) return { type: "other", name: typed.data.type };
	const event = parsed.data;
	if (event.type === "challenge") {
		return { type: "challenge", challenge: toChallenge(event.challenge) };
	}
	const gameId = event.game.gameId ?? event.game.id;
	if (gameId === undefined) return { type: "other", name: event.type };
	return { type: event.type, gameId };
};

export class LichessClient implements HostingClient {
	private readonly baseUrl: string;
	private readonly token: string;
	private readonly timeoutMs: number;
	private readonly streamIdleMs: number;
	private readonly fetchImpl: typeof fetch;
	private readonly resolveRoute: ReturnType<typeof createRouteResolver>;
	private readonly onLog?: (event: ClientLogEvent) => void;
	private username: string | null = null;

	constructor(options: LichessClientOptions) {
		this.baseUrl = trimSlash(options.baseUrl ?? DEFAULT_BASE_URL);
		this.token = options.token;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.streamIdleMs = options.streamIdleMs ?? DEFAULT_STREAM_IDLE_MS;
		this.fetchImpl = options.fetchImpl ?? fetch;
		this.resolveRoute = createRouteResolver(options.routeOverrides);
		this.onLog = options.onLog;
	}

	getBaseUrl() {
		return this.baseUrl;
	}

	private log(event: ClientLogEvent) {
		this.onLog?.(event);
	}

	private async request(
		key: RouteKey,
		params: RouteParams | undefined,
		options?: RequestOptions,
	): Promise<Response> {
		const method = options?.method ?? "GET";
		const path = this.resolveRoute(key, params);
		const query = options?.query
			? `?${new URLSearchParams(options.query).toString()}`
			: "";
		const headers: Record<string, string> = {
			accept: options?.accept ?? "application/json",
			authorization: `Bearer ${this.token}`,
		};
		const body = options?.form ? new URLSearchParams(options.form) : undefined;
		if (body) headers["content-type"] = "application/x-www-form-urlencoded";

		this.log({
			type: "request",
			message: "http_request",
			details: { method, path },
		});

		const response = await this.fetchImpl(`${this.baseUrl}${path}${query}`, {
			method,
			headers,
			body,
			signal: options?.stream
				? options.signal
				: (options?.signal ?? AbortSignal.timeout(this.timeoutMs)),
		});

		this.log({
			type: "response",
			message: "http_response",
			details: { method, path, status: response.status, ok: response.ok },
		});

		if (!response.ok) {
			const text = await response.text().catch(() => "");
			const parsed = parseLine(text);
			const message =
				errorMessageFromBody(parsed === undefined ? text : parsed) ??
				`HTTP ${response.status}`;
			throw new LichessHttpError(response.status, message, parsed ?? text);
		}
		return response;
	}

	private async requestJson(
		key: RouteKey,
		params?: RouteParams,
		options?: RequestOptions,
	): Promise<unknown> {
		const response = await this.request(key, params, options);
		return response.json();
	}

	private async attempt<T>(operation: () => Promise<T>): Promise<Result<T>> {
		try {
			return ok(await operation());
		} catch (error) {
			return toFailure(error);
		}
	}

	async getAccount(): Promise<Result<LichessAccount>> {
		return this.attempt(async () => {
			const parsed = accountSchema.parse(await this.requestJson("account"));
			this.username = parsed.username;
			return {
				id: parsed.id,
				username: parsed.username,
				title: parsed.title ?? null,
				totals: {
					win: parsed.count.win,
					draw: parsed.count.draw,
					loss: parsed.count.loss,
				},
			};
		});
	}

	async getAccountTotals(): Promise<Result<AccountTotals>> {
		const account = await this.getAccount();
		if (!account.ok) return account;
		return ok(account.value.totals);
	}

	async listActiveGames(): Promise<Result<Game[]>> {
		return this.attempt(async () => {
			const parsed = nowPlayingSchema.parse(
				await this.requestJson("account_playing"),
			);
			return parsed.nowPlaying.map((entry): Game => {
				const opponentId =
					entry.opponent.ai === undefined ? entry.opponent.id : null;
				return {
					id: entry.gameId,
					color: entry.color,
					isMyTurn: entry.isMyTurn,
					positionNotation: entry.fen,
					...(opponentId ? { opponentId } : {}),
				};
			});
		});
	}

	async makeMove(gameId: string, move: string): Promise<Result<void>> {
		return this.post("bot_move", { gameId, move });
	}

	async resign(gameId: string): Promise<Result<void>> {
		return this.post("bot_resign", { gameId });
	}

	async acceptChallenge(challengeId: string): Promise<Result<void>> {
		return this.post("challenge_accept", { challengeId });
	}

	async declineChallenge(
		challengeId: string,
		reason = "generic",
	): Promise<Result<void>> {
		return this.post("challenge_decline", { challengeId }, { reason });
	}

	private async post(
		key: RouteKey,
		params: RouteParams,
		form?: Record<string, string>,
	): Promise<Result<void>> {
		const result = await this.attempt(async () => {
			const response = await this.request(key, params, {
				method: "POST",
				form,
			});
			await response.body?.cancel();
		});
		return result.ok ? okVoid() : result;
	}

	async getOpponentOnlineStatus(userId: string): Promise<Result<boolean>> {
		return this.attempt(async () => {
			const statuses = usersStatusSchema.parse(
				await this.requestJson("users_status", undefined, {
					query: { ids: userId },
				}),
			);
			const wanted = userId.toLowerCase();
			const status = statuses.find((entry) => entry.id === wanted);
			if (!status) {
				throw new InvalidResponseError(`User ${userId} not in status list`);
			}
			return status.online ?? false;
		});
	}

	private async resolveUsername(): Promise<string> {
		if (this.username) return this.username;
		const account = await this.getAccount();
		if (!account.ok) {
			throw new InvalidResponseError(
				`Could not resolve account: ${account.error}`,
			);
		}
		return account.value.username;
	}

	async getLastGameId(): Promise<Result<string | null>> {
		return this.attempt(async () => {
			const username = await this.resolveUsername();
			const response = await this.request(
				"games_user",
				{ username },
				{ query: { max: "1" }, accept: "application/x-ndjson" },
			);
			const firstLine = (await response.text())
				.split("\n")
				.map(parseLine)
				.find((line) => line !== undefined);
			if (firstLine === undefined) return null;
			return exportedGameSchema.parse(firstLine).id;
		});
	}

	async createChallenge(
		username: string,
		options?: CreateChallengeOptions,
	): Promise<Result<CreatedChallenge>> {
		return this.attempt(async () => {
			const payload = await this.requestJson(
				"challenge_create",
				{ username },
				{
					method: "POST",
					form: {
						rated: String(options?.rated ?? false),
						"clock.limit": String(options?.clockLimitSeconds ?? 180),
						"clock.increment": String(options?.clockIncrementSeconds ?? 2),
					},
				},
			);
			// Older API versions wrap the created challenge.
			const wrapped = wrappedChallengeSchema.safeParse(payload);
			const challenge = wrapped.success
				? wrapped.data.challenge
				: challengeSchema.parse(payload);
			return { id: challenge.id, url: challenge.url ?? null };
		});
	}

	async *streamEvents(signal?: AbortSignal): AsyncGenerator<HostingEvent> {
		const controller = new AbortController();
		const onAbort = () => controller.abort();
		signal?.addEventListener("abort", onAbort, { once: true });
		let idle = false;
		let idleTimer: ReturnType<typeof setTimeout> | undefined;
		const armIdleTimer = () => {
			clearTimeout(idleTimer);
			idleTimer = setTimeout(() => {
				idle = true;
				controller.abort();
			}, this.streamIdleMs);
		};
		try {
			armIdleTimer();
			const response = await this.request("stream_event", undefined, {
				accept: "application/x-ndjson",
				signal: controller.signal,
				stream: true,
			});
			if (!response.body) {
				throw new InvalidResponseError("Event stream body is not readable.");
			}
			this.log({ type: "stream", message: "event_stream_opened" });
			const lines = readNdjson(response.body, {
				signal: controller.signal,
				onChunk: armIdleTimer,
			});
			for await (const raw of lines) {
				const event = toHostingEvent(raw);
				if (!event) continue;
				clearTimeout(idleTimer);
				yield event;
				armIdleTimer();
			}
		} catch (error) {
			if (!idle) throw error;
			this.log({
				type: "stream",
				message: "event_stream_idle",
				details: { idleMs: this.streamIdleMs },
			});
			throw new Error(
				`Event stream received nothing for ${this.streamIdleMs} ms`,
			);
		} finally {
			clearTimeout(idleTimer);
			signal?.removeEventListener("abort", onAbort);
			controller.abort();
		}
	}
}

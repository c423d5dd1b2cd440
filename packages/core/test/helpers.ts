import { vi } from "vitest";
import { ok, okVoid, type Result } from "../src/result";
import type { Game, HostingClient, HostingEvent } from "../src/types";

export const START_PLACEMENT = "rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR";

export const makeGame = (overrides: Partial<Game> & { id: string }): Game => ({
	color: "white",
	isMyTurn: true,
	positionNotation: START_PLACEMENT,
	...overrides,
});

export const createFakeHosting = (games: Game[] = []) => {
	const events: HostingEvent[] = [];
	const hosting = {
		listActiveGames: vi.fn(
			async (): Promise<Result<Game[]>> =>
				ok(games.map((game) => ({ ...game }))),
		),
		makeMove: vi.fn(async (_gameId: string, _move: string) => okVoid()),
		resign: vi.fn(async (_gameId: string) => okVoid()),
		acceptChallenge: vi.fn(async (_challengeId: string) => okVoid()),
		declineChallenge: vi.fn(async (_challengeId: string, _reason?: string) =>
			okVoid(),
		),
		getOpponentOnlineStatus: vi.fn(
			async (_userId: string): Promise<Result<boolean>> => ok(true),
		),
		getAccountTotals: vi.fn(async () => ok({ win: 0, draw: 0, loss: 0 })),
		getLastGameId: vi.fn(
			async (): Promise<Result<string | null>> => ok(null),
		),
		streamEvents: vi.fn(async function* (_signal?: AbortSignal) {
			for (const event of events) yield event;
		}),
	} satisfies HostingClient;
	return { hosting, events };
};

export const silentLog = () => vi.fn();

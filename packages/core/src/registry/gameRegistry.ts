import type { PositionLookup } from "../ledger/voteLedger";
import { type Logger, log as defaultLog } from "../obs/log";
import { describeFailure } from "../result";
import type { Color, Game, HostingClient } from "../types";

export type GameRegistryOptions = {
	log?: Logger;
};

/**
 * Mirror of the account's ongoing games. Each successful refresh swaps in a
 * whole new snapshot; games missing from the latest listing are gone.
 */
export class GameRegistry implements PositionLookup {
	private games: ReadonlyMap<string, Game> = new Map();
	private readonly hosting: Pick<HostingClient, "listActiveGames">;
	private readonly log: Logger;
	private requested = 0;
	private applied = 0;

	constructor(
		hosting: Pick<HostingClient, "listActiveGames">,
		options?: GameRegistryOptions,
	) {
		this.hosting = hosting;
		this.log = options?.log ?? defaultLog;
	}

	async refresh(): Promise<boolean> {
		const ticket = ++this.requested;
		const result = await this.hosting.listActiveGames();
		if (!result.ok) {
			this.log("warn", "registry_refresh_failed", describeFailure(result));
			return false;
		}
		// An older listing that resolved late must not undo a newer one.
		if (ticket < this.applied) return true;
		this.applied = ticket;

		const next = new Map<string, Game>();
		for (const game of result.value) {
			next.set(game.id, { ...game });
		}
		this.games = next;
		return true;
	}

	get size() {
		return this.games.size;
	}

	has(gameId: string) {
		return this.games.has(gameId);
	}

	snapshotIds(): string[] {
		return [...this.games.keys()];
	}

	snapshot(): Map<string, Game> {
		const copy = new Map<string, Game>();
		for (const [id, game] of this.games) copy.set(id, { ...game });
		return copy;
	}

	get(gameId: string): Game | null {
		const game = this.games.get(gameId);
		return game ? { ...game } : null;
	}

	isMyTurn(gameId: string): boolean | null {
		return this.games.get(gameId)?.isMyTurn ?? null;
	}

	colorOf(gameId: string): Color | null {
		return this.games.get(gameId)?.color ?? null;
	}

	positionOf(gameId: string): string | null {
		return this.games.get(gameId)?.positionNotation ?? null;
	}

	opponentOf(gameId: string): string | null {
		return this.games.get(gameId)?.opponentId ?? null;
	}
}

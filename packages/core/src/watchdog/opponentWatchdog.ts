import { type Logger, log as defaultLog } from "../obs/log";
import type { GameRegistry } from "../registry/gameRegistry";
import { describeFailure } from "../result";
import type { HostingClient } from "../types";

export type OpponentWatchdogDeps = {
	registry: Pick<GameRegistry, "snapshot">;
	hosting: Pick<HostingClient, "getOpponentOnlineStatus" | "resign">;
};

/**
 * Resigns games whose human opponent went offline. A failed status lookup
 * counts as online.
 */
export class OpponentWatchdog {
	private readonly deps: OpponentWatchdogDeps;
	private readonly log: Logger;
	private readonly resigned = new Set<string>();

	constructor(deps: OpponentWatchdogDeps, options?: { log?: Logger }) {
		this.deps = deps;
		this.log = options?.log ?? defaultLog;
	}

	async tick(): Promise<string[]> {
		const games = this.deps.registry.snapshot();
		for (const gameId of this.resigned) {
			if (!games.has(gameId)) this.resigned.delete(gameId);
		}

		const resignedNow: string[] = [];
		for (const game of games.values()) {
			if (!game.opponentId || this.resigned.has(game.id)) continue;

			const status = await this.deps.hosting.getOpponentOnlineStatus(
				game.opponentId,
			);
			if (!status.ok) {
				this.log("warn", "opponent_status_failed", {
					gameId: game.id,
					opponentId: game.opponentId,
					...describeFailure(status),
				});
				continue;
			}
			if (status.value) continue;

			this.log("info", "opponent_offline", {
				gameId: game.id,
				opponentId: game.opponentId,
			});
			const result = await this.deps.hosting.resign(game.id);
			if (!result.ok) {
				this.log("warn", "resign_failed", {
					gameId: game.id,
					...describeFailure(result),
				});
				continue;
			}
			this.resigned.add(game.id);
			resignedNow.push(game.id);
		}
		return resignedNow;
	}
}

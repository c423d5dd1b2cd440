import type { VoteLedger } from "../ledger/voteLedger";
import { sleep } from "../loop";
import { errorMessage, type Logger, log as defaultLog } from "../obs/log";
import type { GameRegistry } from "../registry/gameRegistry";
import { describeFailure } from "../result";
import { DEFAULT_TICKS } from "../ticks";
import type { HostingClient } from "../types";
import {
	anarchyPolicy,
	DEFAULT_RESIGN_RULE,
	type ResignRule,
	type SelectionPolicy,
	shouldResign,
} from "./selection";

export type ArbiterState =
	| "waiting_votes"
	| "deciding"
	| "acting"
	| "terminated";

export type ArbiterOutcome =
	| { kind: "terminated" }
	| { kind: "no_votes" }
	| { kind: "resigned"; ok: boolean }
	| { kind: "awaiting_turn" }
	| { kind: "no_candidate" }
	| { kind: "moved"; move: string }
	| { kind: "move_failed"; move: string; error: string };

export type MoveArbiterDeps = {
	registry: Pick<GameRegistry, "has" | "isMyTurn">;
	ledger: VoteLedger;
	hosting: Pick<HostingClient, "makeMove" | "resign">;
};

export type MoveArbiterOptions = {
	selectionPolicy?: SelectionPolicy;
	resignRule?: ResignRule;
	tickMs?: number;
	log?: Logger;
};

/** Decision loop for one game: tally, resign or play, open a new round. */
export class MoveArbiter {
	readonly gameId: string;
	private currentState: ArbiterState = "waiting_votes";
	private readonly deps: MoveArbiterDeps;
	private readonly selectionPolicy: SelectionPolicy;
	private readonly resignRule: ResignRule;
	private readonly tickMs: number;
	private readonly log: Logger;

	constructor(
		gameId: string,
		deps: MoveArbiterDeps,
		options?: MoveArbiterOptions,
	) {
		this.gameId = gameId;
		this.deps = deps;
		this.selectionPolicy = options?.selectionPolicy ?? anarchyPolicy;
		this.resignRule = options?.resignRule ?? DEFAULT_RESIGN_RULE;
		this.tickMs = options?.tickMs ?? DEFAULT_TICKS.arbiterMs;
		this.log = options?.log ?? defaultLog;
	}

	get state(): ArbiterState {
		return this.currentState;
	}

	async tick(): Promise<ArbiterOutcome> {
		if (this.currentState === "terminated") return { kind: "terminated" };
		const { registry, ledger, hosting } = this.deps;
		const gameId = this.gameId;

		if (!registry.has(gameId)) {
			this.currentState = "terminated";
			ledger.discardGame(gameId);
			this.log("info", "arbiter_terminated", { gameId });
			return { kind: "terminated" };
		}

		const round = ledger.drainRound(gameId);
		if (round.counts.size === 0) {
			ledger.clearRound(gameId);
			return { kind: "no_votes" };
		}

		this.currentState = "deciding";
		try {
			if (shouldResign(round.counts, this.resignRule)) {
				this.currentState = "acting";
				const result = await hosting.resign(gameId);
				if (result.ok) {
					this.log("info", "game_resigned_by_vote", {
						gameId,
						totalVotes: round.total,
					});
				} else {
					this.log("warn", "resign_failed", {
						gameId,
						...describeFailure(result),
					});
				}
				ledger.settleRound(gameId, round);
				return { kind: "resigned", ok: result.ok };
			}

			if (registry.isMyTurn(gameId) === false) {
				return { kind: "awaiting_turn" };
			}

			const move = this.selectionPolicy(round.counts);
			if (move === null) {
				return { kind: "no_candidate" };
			}

			this.currentState = "acting";
			const result = await hosting.makeMove(gameId, move);
			if (result.ok) {
				ledger.settleRound(gameId, round);
				this.log("info", "move_played", {
					gameId,
					move,
					votes: round.counts.get(move) ?? 0,
					totalVotes: round.total,
				});
				return { kind: "moved", move };
			}

			// Drop the rejected candidate and let everyone vote again.
			ledger.removeCandidate(gameId, move);
			ledger.resetVoters(gameId);
			this.log("warn", "move_rejected", {
				gameId,
				move,
				...describeFailure(result),
			});
			return { kind: "move_failed", move, error: result.error };
		} finally {
			this.currentState = "waiting_votes";
		}
	}

	/** Ticks until the game leaves the registry or `signal` aborts. */
	async run(signal?: AbortSignal): Promise<void> {
		while (!signal?.aborted) {
			try {
				const outcome = await this.tick();
				if (outcome.kind === "terminated") return;
			} catch (error) {
				this.log("error", "arbiter_tick_failed", {
					gameId: this.gameId,
					error: errorMessage(error),
				});
			}
			await sleep(this.tickMs, signal);
		}
	}
}

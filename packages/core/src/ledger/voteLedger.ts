import { validateAndNormalize, type Position } from "../moves/notation";
import { type Logger, log as defaultLog } from "../obs/log";
import type { Color } from "../types";

export const RESIGN_TOKEN = "resign";

/** Where the ledger looks up a game's board to resolve abbreviated moves. */
export type PositionLookup = {
	positionOf(gameId: string): string | null;
	colorOf(gameId: string): Color | null;
};

export type RoundSnapshot = {
	/** Candidate -> votes, in the order candidates were first proposed. */
	counts: Map<string, number>;
	total: number;
	/** Users who had voted when the round was drained. */
	voters: Set<string>;
};

type Round = {
	counts: Map<string, number>;
	voters: Set<string>;
};

export type VoteLedgerOptions = {
	log?: Logger;
};

/**
 * Per-game vote rounds. Every method runs to completion synchronously, so a
 * round is never observed half-updated by another worker.
 */
export class VoteLedger {
	private readonly rounds = new Map<string, Round>();
	private readonly positions: PositionLookup;
	private readonly log: Logger;

	constructor(positions: PositionLookup, options?: VoteLedgerOptions) {
		this.positions = positions;
		this.log = options?.log ?? defaultLog;
	}

	private round(gameId: string): Round {
		let round = this.rounds.get(gameId);
		if (!round) {
			round = { counts: new Map(), voters: new Set() };
			this.rounds.set(gameId, round);
		}
		return round;
	}

	private increment(gameId: string, candidate: string) {
		const counts = this.round(gameId).counts;
		counts.set(candidate, (counts.get(candidate) ?? 0) + 1);
	}

	private positionFor(gameId: string): Position | null {
		const notation = this.positions.positionOf(gameId);
		const color = this.positions.colorOf(gameId);
		if (notation === null || color === null) return null;
		return { notation, color };
	}

	recordMoveVote(gameId: string, rawMoveText: string): boolean {
		const normalized = validateAndNormalize(
			this.positionFor(gameId),
			rawMoveText,
		);
		if (!normalized.ok) {
			this.log("debug", "move_vote_rejected", {
				gameId,
				move: rawMoveText,
				reason: normalized.reason,
			});
			return false;
		}
		this.increment(gameId, normalized.move);
		this.log("debug", "move_vote_recorded", {
			gameId,
			move: normalized.move,
		});
		return true;
	}

	recordResignVote(gameId: string): boolean {
		this.increment(gameId, RESIGN_TOKEN);
		this.log("debug", "resign_vote_recorded", { gameId });
		return true;
	}

	drainRound(gameId: string): RoundSnapshot {
		const round = this.rounds.get(gameId);
		const counts = new Map(round?.counts ?? []);
		let total = 0;
		for (const votes of counts.values()) total += votes;
		return { counts, total, voters: new Set(round?.voters ?? []) };
	}

	/**
	 * Removes what `drained` held from the round. Votes recorded after the
	 * drain stay and carry over to the next round.
	 */
	settleRound(gameId: string, drained: RoundSnapshot) {
		const round = this.rounds.get(gameId);
		if (!round) return;
		for (const [candidate, votes] of drained.counts) {
			const left = (round.counts.get(candidate) ?? 0) - votes;
			if (left > 0) round.counts.set(candidate, left);
			else round.counts.delete(candidate);
		}
		for (const user of drained.voters) round.voters.delete(user);
	}

	clearRound(gameId: string) {
		const round = this.rounds.get(gameId);
		if (!round) return;
		round.counts.clear();
		round.voters.clear();
	}

	removeCandidate(gameId: string, candidate: string) {
		this.rounds.get(gameId)?.counts.delete(candidate);
	}

	resetVoters(gameId: string) {
		this.rounds.get(gameId)?.voters.clear();
	}

	hasUserVoted(gameId: string, user: string): boolean {
		return this.rounds.get(gameId)?.voters.has(user) ?? false;
	}

	markUserVoted(gameId: string, user: string) {
		this.round(gameId).voters.add(user);
	}

	discardGame(gameId: string) {
		this.rounds.delete(gameId);
	}
}

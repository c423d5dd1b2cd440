import type { VoteLedger } from "../ledger/voteLedger";
import { type Logger, log as defaultLog } from "../obs/log";
import type { GameRegistry } from "../registry/gameRegistry";
import type { ChatClient, ChatMessage } from "../types";
import { parseChatLine } from "./chatCommands";

export type ChatVoteOutcome =
	| "resign_vote"
	| "move_vote"
	| "duplicate"
	| "invalid"
	| "no_game"
	| "reserved"
	| "ignored";

export type ChatIngestDeps = {
	chat: ChatClient;
	registry: Pick<GameRegistry, "snapshotIds">;
	ledger: Pick<
		VoteLedger,
		"recordMoveVote" | "recordResignVote" | "hasUserVoted" | "markUserVoted"
	>;
};

export type ChatIngestOptions = {
	batchSize?: number;
	log?: Logger;
};

const DEFAULT_BATCH_SIZE = 256;

/**
 * Turns chat lines into votes for the first listed game. One vote per user
 * per round, whichever kind comes first; bad lines are dropped silently.
 */
export class ChatIngestCoordinator {
	private readonly deps: ChatIngestDeps;
	private readonly batchSize: number;
	private readonly log: Logger;

	constructor(deps: ChatIngestDeps, options?: ChatIngestOptions) {
		this.deps = deps;
		this.batchSize = options?.batchSize ?? DEFAULT_BATCH_SIZE;
		this.log = options?.log ?? defaultLog;
	}

	tick(): ChatVoteOutcome[] {
		const messages = this.deps.chat.pollMessages(this.batchSize);
		return messages.map((message) => this.handleMessage(message));
	}

	handleMessage(message: ChatMessage): ChatVoteOutcome {
		const intent = parseChatLine(message.text);
		if (!intent) return "ignored";
		if (intent.kind === "challenge") return "reserved";

		const gameId = this.deps.registry.snapshotIds()[0];
		if (gameId === undefined) return "no_game";

		const { ledger } = this.deps;
		if (ledger.hasUserVoted(gameId, message.username)) {
			this.log("debug", "duplicate_vote_dropped", {
				gameId,
				username: message.username,
			});
			return "duplicate";
		}

		if (intent.kind === "resign") {
			ledger.recordResignVote(gameId);
			ledger.markUserVoted(gameId, message.username);
			return "resign_vote";
		}

		if (!ledger.recordMoveVote(gameId, intent.text)) return "invalid";
		ledger.markUserVoted(gameId, message.username);
		return "move_vote";
	}
}

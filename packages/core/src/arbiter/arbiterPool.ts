import { errorMessage, type Logger, log as defaultLog } from "../obs/log";
import type { GameRegistry } from "../registry/gameRegistry";
import {
	MoveArbiter,
	type MoveArbiterDeps,
	type MoveArbiterOptions,
} from "./moveArbiter";

export type ArbiterPoolDeps = MoveArbiterDeps & {
	registry: Pick<GameRegistry, "has" | "isMyTurn" | "snapshotIds">;
};

/**
 * Keeps one arbiter worker per listed game. Workers stop on their own once
 * their game leaves the registry; the pool only ever starts them.
 */
export class ArbiterPool {
	private readonly workers = new Map<string, Promise<void>>();
	private readonly abortController = new AbortController();
	private readonly deps: ArbiterPoolDeps;
	private readonly arbiterOptions: MoveArbiterOptions;
	private readonly log: Logger;

	constructor(deps: ArbiterPoolDeps, arbiterOptions?: MoveArbiterOptions) {
		this.deps = deps;
		this.arbiterOptions = arbiterOptions ?? {};
		this.log = arbiterOptions?.log ?? defaultLog;
	}

	runningGameIds(): string[] {
		return [...this.workers.keys()];
	}

	reconcile(): string[] {
		if (this.abortController.signal.aborted) return [];
		const started: string[] = [];
		for (const gameId of this.deps.registry.snapshotIds()) {
			if (this.workers.has(gameId)) continue;
			const arbiter = new MoveArbiter(gameId, this.deps, this.arbiterOptions);
			const worker = arbiter
				.run(this.abortController.signal)
				.catch((error) => {
					this.log("error", "arbiter_worker_crashed", {
						gameId,
						error: errorMessage(error),
					});
				})
				.finally(() => {
					this.workers.delete(gameId);
				});
			this.workers.set(gameId, worker);
			started.push(gameId);
			this.log("info", "arbiter_started", { gameId });
		}
		return started;
	}

	async stop(): Promise<void> {
		this.abortController.abort();
		await Promise.all(this.workers.values());
	}
}

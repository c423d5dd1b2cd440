import { type Logger, log as defaultLog } from "../obs/log";
import type { GameRegistry } from "../registry/gameRegistry";
import { describeFailure } from "../result";
import type { Challenge, HostingClient } from "../types";

export type ChallengeDecision = "accept" | "decline";

export type ChallengeGatekeeperDeps = {
	registry: Pick<GameRegistry, "refresh" | "size">;
	hosting: Pick<HostingClient, "acceptChallenge" | "declineChallenge">;
};

/** Only casual games, and only one at a time. */
export const evaluateChallenge = (
	challenge: Challenge,
	activeGames: number,
): ChallengeDecision =>
	activeGames === 0 && !challenge.rated ? "accept" : "decline";

export class ChallengeGatekeeper {
	private readonly deps: ChallengeGatekeeperDeps;
	private readonly log: Logger;

	constructor(deps: ChallengeGatekeeperDeps, options?: { log?: Logger }) {
		this.deps = deps;
		this.log = options?.log ?? defaultLog;
	}

	async decide(challenge: Challenge): Promise<ChallengeDecision> {
		await this.deps.registry.refresh();
		const decision = evaluateChallenge(challenge, this.deps.registry.size);

		const result =
			decision === "accept"
				? await this.deps.hosting.acceptChallenge(challenge.id)
				: await this.deps.hosting.declineChallenge(challenge.id);

		const fields = {
			challengeId: challenge.id,
			challengerId: challenge.challengerId,
			rated: challenge.rated,
		};
		if (!result.ok) {
			this.log("warn", `challenge_${decision}_failed`, {
				...fields,
				...describeFailure(result),
			});
		} else {
			this.log(
				"info",
				decision === "accept" ? "challenge_accepted" : "challenge_declined",
				fields,
			);
		}
		return decision;
	}
}

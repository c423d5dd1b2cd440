import { RESIGN_TOKEN } from "../ledger/voteLedger";

/**
 * Picks the move to play from a drained round, or null to skip the cycle.
 * `counts` iterates in the order candidates were first proposed.
 */
export type SelectionPolicy = (
	counts: ReadonlyMap<string, number>,
) => string | null;

export type ResignRule = {
	minVotes: number;
	minShare: number;
};

export const DEFAULT_RESIGN_RULE: ResignRule = {
	minVotes: 1,
	minShare: 0.1,
};

/** First proposed candidate wins, whatever its tally. */
export const anarchyPolicy: SelectionPolicy = (counts) => {
	for (const candidate of counts.keys()) {
		if (candidate !== RESIGN_TOKEN) return candidate;
	}
	return null;
};

export const shouldResign = (
	counts: ReadonlyMap<string, number>,
	rule: ResignRule = DEFAULT_RESIGN_RULE,
): boolean => {
	let total = 0;
	for (const votes of counts.values()) total += votes;
	if (total === 0 || total < rule.minVotes) return false;
	const resignVotes = counts.get(RESIGN_TOKEN) ?? 0;
	return resignVotes / total >= rule.minShare;
};

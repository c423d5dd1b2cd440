export { ArbiterPool, type ArbiterPoolDeps } from "./arbiter/arbiterPool";
export {
	type ArbiterOutcome,
	type ArbiterState,
	MoveArbiter,
	type MoveArbiterDeps,
	type MoveArbiterOptions,
} from "./arbiter/moveArbiter";
export {
	anarchyPolicy,
	DEFAULT_RESIGN_RULE,
	type ResignRule,
	type SelectionPolicy,
	shouldResign,
} from "./arbiter/selection";
export { HostingEventListener } from "./challenges/eventListener";
export {
	type ChallengeDecision,
	ChallengeGatekeeper,
	evaluateChallenge,
} from "./challenges/gatekeeper";
export { type ChatIntent, parseChatLine } from "./chat/chatCommands";
export { ChatIngestCoordinator, type ChatVoteOutcome } from "./chat/chatIngest";
export {
	type PositionLookup,
	RESIGN_TOKEN,
	type RoundSnapshot,
	VoteLedger,
} from "./ledger/voteLedger";
export { runEvery, sleep } from "./loop";
export {
	fenForTurn,
	isAbbreviatedMove,
	isCoordinateMove,
	type NormalizedMove,
	type Position,
	validateAndNormalize,
} from "./moves/notation";
export {
	errorMessage,
	isLogLevel,
	type Logger,
	type LogLevel,
	log,
	setLogLevel,
} from "./obs/log";
export { redactRecord } from "./obs/redact";
export { OverlayPublisher } from "./overlay/overlayPublisher";
export {
	buildGameUrl,
	gameIdFromUrl,
	type OverlayState,
	OverlayStore,
	overlayStateSchema,
} from "./overlay/overlayStore";
export { GameRegistry } from "./registry/gameRegistry";
export {
	describeFailure,
	type Failure,
	type FailureCode,
	fail,
	ok,
	okVoid,
	type Result,
} from "./result";
export { BotRuntime, type BotRuntimeOptions } from "./runtime";
export { DEFAULT_TICKS, resolveTicks, type TickIntervals } from "./ticks";
export type {
	AccountTotals,
	Challenge,
	ChatClient,
	ChatMessage,
	Color,
	Game,
	HostingClient,
	HostingEvent,
} from "./types";
export { OpponentWatchdog } from "./watchdog/opponentWatchdog";

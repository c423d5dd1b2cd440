export {
	DEFAULT_BASE_URL,
	DEFAULT_STREAM_IDLE_MS,
	LichessClient,
	toHostingEvent,
} from "./client";
export {
	errorMessageFromBody,
	InvalidResponseError,
	LichessHttpError,
	toFailure,
} from "./errors";
export { type ReadNdjsonOptions, readNdjson } from "./ndjson";
export {
	createRouteResolver,
	DEFAULT_ROUTES,
	type RouteKey,
	type RouteTable,
} from "./routes";
export type {
	ClientLogEvent,
	CreateChallengeOptions,
	CreatedChallenge,
	LichessAccount,
	LichessClientOptions,
} from "./types";

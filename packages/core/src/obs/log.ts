import { redactRecord } from "./redact";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = (
	level: LogLevel,
	message: string,
	fields?: Record<string, unknown>,
) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

let minLevel: LogLevel = "info";

export const setLogLevel = (level: LogLevel) => {
	minLevel = level;
};

export const isLogLevel = (value: string): value is LogLevel =>
	Object.hasOwn(LEVEL_ORDER, value);

export const errorMessage = (error: unknown) =>
	error instanceof Error ? error.message : String(error);

export const log: Logger = (level, message, fields) => {
	if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
	const payload = {
		timestamp: new Date().toISOString(),
		level,
		message,
		...(fields ? redactRecord(fields) : {}),
	};

	// eslint-disable-next-line no-console
	const fn = console[level] ?? console.log;
	fn(JSON.stringify(payload));
};

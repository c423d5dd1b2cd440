import { type Failure, fail } from "@crowdmove/core";
import { ZodError } from "zod";

export const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/** Lichess answers errors as `{ "error": "..." }`, sometimes as plain text. */
export const errorMessageFromBody = (body: unknown): string | null => {
	if (typeof body === "string") return body.trim() || null;
	if (!isRecord(body)) return null;
	const error = body.error;
	if (typeof error === "string") return error;
	if (isRecord(error)) return JSON.stringify(error);
	return null;
};

export class LichessHttpError extends Error {
	readonly status: number;
	readonly body: unknown;

	constructor(status: number, message: string, body: unknown) {
		super(message);
		this.name = "LichessHttpError";
		this.status = status;
		this.body = body;
	}
}

export class InvalidResponseError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "InvalidResponseError";
	}
}

/** Maps anything a request can throw onto the shared failure taxonomy. */
export const toFailure = (error: unknown): Failure => {
	if (error instanceof LichessHttpError) {
		return fail(error.message, "http", error.status);
	}
	if (error instanceof ZodError) {
		return fail(
			`Unexpected response shape: ${error.issues
				.map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
				.join("; ")}`,
			"invalid_response",
		);
	}
	if (error instanceof InvalidResponseError || error instanceof SyntaxError) {
		return fail(error.message, "invalid_response");
	}
	if (error instanceof Error) {
		if (error.name === "TimeoutError" || error.name === "AbortError") {
			return fail(error.message, "timeout");
		}
		return fail(error.message, "network");
	}
	return fail(String(error), "network");
};

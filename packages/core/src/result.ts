export type FailureCode = "network" | "timeout" | "http" | "invalid_response";

export type Failure = {
	ok: false;
	error: string;
	code: FailureCode;
	status?: number;
};

export type Result<T> = { ok: true; value: T } | Failure;

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const okVoid = (): Result<void> => ({ ok: true, value: undefined });

export const fail = (
	error: string,
	code: FailureCode,
	status?: number,
): Failure => ({
	ok: false,
	error,
	code,
	...(status === undefined ? {} : { status }),
});

export const describeFailure = (failure: Failure) => ({
	error: failure.error,
	code: failure.code,
	status: failure.status ?? null,
});

import { errorMessage, type Logger, log as defaultLog } from "./obs/log";

/** Resolves after `ms`, or as soon as `signal` aborts. */
export const sleep = (ms: number, signal?: AbortSignal) =>
	new Promise<void>((resolve) => {
		if (signal?.aborted) {
			resolve();
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});

export type LoopOptions = {
	signal?: AbortSignal;
	log?: Logger;
};

/**
 * Runs `tick` every `intervalMs` until the signal aborts. A throwing tick is
 * logged and the loop carries on with the next one.
 */
export const runEvery = async (
	name: string,
	intervalMs: number,
	tick: () => Promise<unknown> | unknown,
	options?: LoopOptions,
): Promise<void> => {
	const log = options?.log ?? defaultLog;
	const signal = options?.signal;
	while (!signal?.aborted) {
		try {
			await tick();
		} catch (error) {
			log("error", "worker_tick_failed", {
				worker: name,
				error: errorMessage(error),
			});
		}
		if (signal?.aborted) break;
		await sleep(intervalMs, signal);
	}
};

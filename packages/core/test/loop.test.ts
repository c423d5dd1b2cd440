import { describe, expect, it, vi } from "vitest";
import { runEvery, sleep } from "../src/loop";
import { silentLog } from "./helpers";

describe("sleep", () => {
	it("resolves early when the signal aborts", async () => {
		const controller = new AbortController();
		const pending = sleep(60_000, controller.signal);
		controller.abort();
		await expect(pending).resolves.toBeUndefined();
	});
});

describe("runEvery", () => {
	it("keeps ticking after a failure until aborted", async () => {
		const controller = new AbortController();
		const log = silentLog();
		let calls = 0;
		const tick = vi.fn(() => {
			calls += 1;
			if (calls === 1) throw new Error("boom");
			if (calls === 3) controller.abort();
		});

		await runEvery("test", 1, tick, { signal: controller.signal, log });

		expect(tick).toHaveBeenCalledTimes(3);
		expect(log).toHaveBeenCalledWith("error", "worker_tick_failed", {
			worker: "test",
			error: "boom",
		});
	});
});

import { describe, expect, it } from "vitest";
import { GameRegistry } from "../src/registry/gameRegistry";
import { fail, ok } from "../src/result";
import { OpponentWatchdog } from "../src/watchdog/opponentWatchdog";
import { createFakeHosting, makeGame, silentLog } from "./helpers";

const setup = async () => {
	const { hosting } = createFakeHosting([
		makeGame({ id: "vs-human", opponentId: "bob" }),
		makeGame({ id: "vs-ai" }),
	]);
	const log = silentLog();
	const registry = new GameRegistry(hosting, { log });
	await registry.refresh();
	const watchdog = new OpponentWatchdog({ registry, hosting }, { log });
	return { hosting, registry, watchdog, log };
};

describe("OpponentWatchdog", () => {
	it("only checks human opponents", async () => {
		const { hosting, watchdog } = await setup();
		expect(await watchdog.tick()).toEqual([]);
		expect(hosting.getOpponentOnlineStatus).toHaveBeenCalledTimes(1);
		expect(hosting.getOpponentOnlineStatus).toHaveBeenCalledWith("bob");
		expect(hosting.resign).not.toHaveBeenCalled();
	});

	it("resigns once when the opponent is offline", async () => {
		const { hosting, watchdog } = await setup();
		hosting.getOpponentOnlineStatus.mockResolvedValue(ok(false));

		expect(await watchdog.tick()).toEqual(["vs-human"]);
		expect(await watchdog.tick()).toEqual([]);
		expect(hosting.resign).toHaveBeenCalledTimes(1);
		expect(hosting.resign).toHaveBeenCalledWith("vs-human");
	});

	it("treats a failed lookup as online", async () => {
		const { hosting, watchdog, log } = await setup();
		hosting.getOpponentOnlineStatus.mockResolvedValueOnce(
			fail("The operation was aborted due to timeout", "timeout"),
		);

		expect(await watchdog.tick()).toEqual([]);
		expect(hosting.resign).not.toHaveBeenCalled();
		expect(log).toHaveBeenCalledWith("warn", "opponent_status_failed", {
			gameId: "vs-human",
			opponentId: "bob",
			error: "The operation was aborted due to timeout",
			code: "timeout",
			status: null,
		});
	});

	it("retries a resignation the server refused", async () => {
		const { hosting, watchdog } = await setup();
		hosting.getOpponentOnlineStatus.mockResolvedValue(ok(false));
		hosting.resign.mockResolvedValueOnce(fail("Bad Gateway", "http", 502));

		expect(await watchdog.tick()).toEqual([]);
		expect(await watchdog.tick()).toEqual(["vs-human"]);
		expect(hosting.resign).toHaveBeenCalledTimes(2);
	});
});

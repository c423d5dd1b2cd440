import { describe, expect, it, vi } from "vitest";
import { ArbiterPool } from "../src/arbiter/arbiterPool";
import { VoteLedger } from "../src/ledger/voteLedger";
import { GameRegistry } from "../src/registry/gameRegistry";
import type { Game } from "../src/types";
import { createFakeHosting, makeGame, silentLog } from "./helpers";

const setup = async (games: Game[]) => {
	const log = silentLog();
	const { hosting } = createFakeHosting(games);
	const registry = new GameRegistry(hosting, { log });
	await registry.refresh();
	const ledger = new VoteLedger(registry, { log });
	const pool = new ArbiterPool(
		{ registry, ledger, hosting },
		{ tickMs: 1, log },
	);
	return { hosting, registry, ledger, pool, log };
};

describe("ArbiterPool", () => {
	it("starts one worker per listed game", async () => {
		const { pool } = await setup([
			makeGame({ id: "g1" }),
			makeGame({ id: "g2" }),
		]);

		expect(pool.reconcile()).toEqual(["g1", "g2"]);
		expect(pool.reconcile()).toEqual([]);
		expect(pool.runningGameIds()).toEqual(["g1", "g2"]);

		await pool.stop();
		expect(pool.runningGameIds()).toEqual([]);
	});

	it("retires a worker once its game is gone", async () => {
		const games = [makeGame({ id: "g1" }), makeGame({ id: "g2" })];
		const { registry, pool } = await setup(games);
		pool.reconcile();

		games.splice(1, 1);
		await registry.refresh();

		await vi.waitFor(() => {
			expect(pool.runningGameIds()).toEqual(["g1"]);
		});
		await pool.stop();
	});

	it("plays the voted move from its worker", async () => {
		const { hosting, ledger, pool } = await setup([makeGame({ id: "g1" })]);
		ledger.recordMoveVote("g1", "e4");
		pool.reconcile();

		await vi.waitFor(() => {
			expect(hosting.makeMove).toHaveBeenCalledWith("g1", "e2e4");
		});
		await pool.stop();
	});

	it("starts nothing after it was stopped", async () => {
		const { pool } = await setup([makeGame({ id: "g1" })]);
		await pool.stop();
		expect(pool.reconcile()).toEqual([]);
	});
});

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { OverlayPublisher } from "../src/overlay/overlayPublisher";
import {
	buildGameUrl,
	gameIdFromUrl,
	OverlayStore,
} from "../src/overlay/overlayStore";
import { GameRegistry } from "../src/registry/gameRegistry";
import { fail, ok } from "../src/result";
import type { Game } from "../src/types";
import { createFakeHosting, makeGame, silentLog } from "./helpers";

let dir = "";

beforeEach(async () => {
	dir = await mkdtemp(path.join(tmpdir(), "crowdmove-overlay-"));
});

afterEach(async () => {
	await rm(dir, { recursive: true, force: true });
});

const readJson = async (filePath: string): Promise<unknown> =>
	JSON.parse(await readFile(filePath, "utf8"));

describe("game urls", () => {
	it("joins the base and the id", () => {
		expect(buildGameUrl("http://www.lichess.org/", "abcd1234")).toBe(
			"http://www.lichess.org/abcd1234",
		);
	});

	it("takes the id from the last path segment", () => {
		expect(gameIdFromUrl("http://www.lichess.org/abcd1234")).toBe("abcd1234");
		expect(gameIdFromUrl("")).toBe("");
	});
});

describe("OverlayStore", () => {
	it("writes and reads back the same state", async () => {
		const store = new OverlayStore(path.join(dir, "obs", "info.json"), {
			log: silentLog(),
		});
		await store.write({ wins: 1, losses: 2, draws: 3, url: "x" });

		expect(await store.read()).toEqual({
			wins: 1,
			losses: 2,
			draws: 3,
			url: "x",
		});
	});

	it("regenerates a corrupted file from the default url", async () => {
		const filePath = path.join(dir, "info.json");
		await writeFile(filePath, "{not json", "utf8");
		const log = silentLog();
		const store = new OverlayStore(filePath, {
			defaultUrl: async () => "http://www.lichess.org/last1",
			log,
		});

		expect(await store.read()).toEqual({
			wins: 0,
			losses: 0,
			draws: 0,
			url: "http://www.lichess.org/last1",
		});
		expect(await readJson(filePath)).toEqual({
			wins: 0,
			losses: 0,
			draws: 0,
			url: "http://www.lichess.org/last1",
		});
		expect(log).toHaveBeenCalledWith("info", "overlay_file_created", {
			path: filePath,
		});
	});

	it("regenerates a file with the wrong shape", async () => {
		const filePath = path.join(dir, "info.json");
		await writeFile(filePath, JSON.stringify({ wins: "many" }), "utf8");
		const store = new OverlayStore(filePath, { log: silentLog() });

		expect(await store.read()).toEqual({
			wins: 0,
			losses: 0,
			draws: 0,
			url: "",
		});
	});

	it("merges a partial update into the stored state", async () => {
		const filePath = path.join(dir, "info.json");
		const store = new OverlayStore(filePath, { log: silentLog() });
		await store.write({ wins: 4, losses: 5, draws: 6, url: "old" });

		expect(await store.update({ url: "new" })).toEqual({
			wins: 4,
			losses: 5,
			draws: 6,
			url: "new",
		});
		expect(await readJson(filePath)).toEqual({
			wins: 4,
			losses: 5,
			draws: 6,
			url: "new",
		});
	});
});

describe("OverlayPublisher", () => {
	const setup = async (games: Game[]) => {
		const log = silentLog();
		const { hosting } = createFakeHosting(games);
		hosting.getAccountTotals.mockResolvedValue(
			ok({ win: 5, draw: 1, loss: 2 }),
		);
		const registry = new GameRegistry(hosting, { log });
		const filePath = path.join(dir, "obs", "info.json");
		const store = new OverlayStore(filePath, {
			defaultUrl: async () => "https://lichess.org/old1",
			log,
		});
		const publisher = new OverlayPublisher(
			{ registry, hosting, store },
			{ gameUrlBase: "https://lichess.org", log },
		);
		return { hosting, registry, publisher, filePath };
	};

	it("refreshes the counters once between games", async () => {
		const games: Game[] = [];
		const { hosting, registry, publisher, filePath } = await setup(games);
		await registry.refresh();

		await publisher.tick();
		await publisher.tick();

		expect(hosting.getAccountTotals).toHaveBeenCalledTimes(1);
		expect(publisher.hasRefreshedCounters).toBe(true);
		expect(await readJson(filePath)).toEqual({
			wins: 5,
			losses: 2,
			draws: 1,
			url: "https://lichess.org/old1",
		});
	});

	it("points the overlay at a new game and re-arms the counters", async () => {
		const games: Game[] = [];
		const { hosting, registry, publisher, filePath } = await setup(games);
		await registry.refresh();
		await publisher.tick();

		games.push(makeGame({ id: "new1" }));
		await registry.refresh();
		await publisher.tick();

		expect(publisher.hasRefreshedCounters).toBe(false);
		expect(await readJson(filePath)).toEqual({
			wins: 5,
			losses: 2,
			draws: 1,
			url: "https://lichess.org/new1",
		});

		games.pop();
		await registry.refresh();
		await publisher.tick();
		expect(hosting.getAccountTotals).toHaveBeenCalledTimes(2);
	});

	it("leaves the file alone when the url already matches", async () => {
		const { registry, publisher, filePath } = await setup([
			makeGame({ id: "old1" }),
		]);
		await registry.refresh();

		await publisher.tick();

		expect(await readJson(filePath)).toEqual({
			wins: 0,
			losses: 0,
			draws: 0,
			url: "https://lichess.org/old1",
		});
	});

	it("retries the counters after a failed lookup", async () => {
		const { hosting, registry, publisher } = await setup([]);
		hosting.getAccountTotals.mockResolvedValueOnce(
			fail("Service Unavailable", "http", 503),
		);
		await registry.refresh();

		await publisher.tick();
		expect(publisher.hasRefreshedCounters).toBe(false);
		await publisher.tick();
		expect(publisher.hasRefreshedCounters).toBe(true);
		expect(hosting.getAccountTotals).toHaveBeenCalledTimes(2);
	});
});

describe("OverlayStore failures", () => {
	it("gives up when the file cannot be recreated", async () => {
		const blocker = path.join(dir, "blocker");
		await writeFile(blocker, "", "utf8");
		const log = silentLog();
		const store = new OverlayStore(path.join(blocker, "info.json"), { log });

		expect(await store.read()).toBeNull();
		expect(log).toHaveBeenCalledWith(
			"error",
			"overlay_file_unrecoverable",
			expect.objectContaining({ path: path.join(blocker, "info.json") }),
		);
	});
});

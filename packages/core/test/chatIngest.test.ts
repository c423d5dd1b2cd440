import { describe, expect, it, vi } from "vitest";
import { parseChatLine } from "../src/chat/chatCommands";
import { ChatIngestCoordinator } from "../src/chat/chatIngest";
import { RESIGN_TOKEN, VoteLedger } from "../src/ledger/voteLedger";
import { GameRegistry } from "../src/registry/gameRegistry";
import type { ChatMessage, Game } from "../src/types";
import { createFakeHosting, makeGame, silentLog } from "./helpers";

describe("parseChatLine", () => {
	it("recognises the resign command", () => {
		expect(parseChatLine("!resign")).toEqual({ kind: "resign" });
		expect(parseChatLine("  !resign now ")).toEqual({ kind: "resign" });
	});

	it("keeps the challenge command as a reserved intent", () => {
		expect(parseChatLine("!challenge someone")).toEqual({
			kind: "challenge",
			target: "someone",
		});
		expect(parseChatLine("!challenge")).toEqual({
			kind: "challenge",
			target: null,
		});
	});

	it("ignores unknown commands", () => {
		expect(parseChatLine("!uptime")).toBeNull();
	});

	it("reads single tokens as move proposals", () => {
		expect(parseChatLine("e2e4")).toEqual({ kind: "move", text: "e2e4" });
		expect(parseChatLine(" Nf3 ")).toEqual({ kind: "move", text: "Nf3" });
		expect(parseChatLine("e4!?")).toEqual({ kind: "move", text: "e4" });
	});

	it("ignores sentences and stray symbols", () => {
		expect(parseChatLine("e4 is a great move")).toBeNull();
		expect(parseChatLine("gg :)")).toBeNull();
		expect(parseChatLine("???")).toBeNull();
		expect(parseChatLine("")).toBeNull();
	});
});

const setup = async (games: Game[] = [makeGame({ id: "g1" })]) => {
	const log = silentLog();
	const { hosting } = createFakeHosting(games);
	const registry = new GameRegistry(hosting, { log });
	await registry.refresh();
	const ledger = new VoteLedger(registry, { log });
	const inbox: ChatMessage[] = [];
	const chat = {
		pollMessages: vi.fn((maxCount: number) => inbox.splice(0, maxCount)),
	};
	const ingest = new ChatIngestCoordinator(
		{ chat, registry, ledger },
		{ batchSize: 10, log },
	);
	return { ingest, ledger, inbox, chat };
};

describe("ChatIngestCoordinator", () => {
	it("records one vote per user per round", async () => {
		const { ingest, ledger } = await setup();

		expect(ingest.handleMessage({ username: "alice", text: "e4" })).toBe(
			"move_vote",
		);
		expect(ingest.handleMessage({ username: "alice", text: "d4" })).toBe(
			"duplicate",
		);
		expect(ingest.handleMessage({ username: "alice", text: "!resign" })).toBe(
			"duplicate",
		);
		expect(ingest.handleMessage({ username: "bob", text: "!resign" })).toBe(
			"resign_vote",
		);
		expect(ingest.handleMessage({ username: "bob", text: "e2e4" })).toBe(
			"duplicate",
		);

		expect([...ledger.drainRound("g1").counts.entries()]).toEqual([
			["e2e4", 1],
			[RESIGN_TOKEN, 1],
		]);
	});

	it("lets a user retry after an invalid move", async () => {
		const { ingest, ledger } = await setup();

		expect(ingest.handleMessage({ username: "carol", text: "Ke3" })).toBe(
			"invalid",
		);
		expect(ledger.hasUserVoted("g1", "carol")).toBe(false);
		expect(ingest.handleMessage({ username: "carol", text: "Nc3" })).toBe(
			"move_vote",
		);
		expect(ledger.drainRound("g1").counts.get("b1c3")).toBe(1);
	});

	it("drops votes while no game is running", async () => {
		const { ingest, ledger } = await setup([]);
		expect(ingest.handleMessage({ username: "alice", text: "e4" })).toBe(
			"no_game",
		);
		expect(ingest.handleMessage({ username: "alice", text: "!resign" })).toBe(
			"no_game",
		);
		expect(ledger.drainRound("g1").total).toBe(0);
	});

	it("treats the challenge command as a no-op", async () => {
		const { ingest, ledger } = await setup();
		expect(
			ingest.handleMessage({ username: "alice", text: "!challenge bob" }),
		).toBe("reserved");
		expect(ledger.hasUserVoted("g1", "alice")).toBe(false);
	});

	it("votes in the first listed game", async () => {
		const { ingest, ledger } = await setup([
			makeGame({ id: "first" }),
			makeGame({ id: "second" }),
		]);
		ingest.handleMessage({ username: "alice", text: "e2e4" });
		expect(ledger.drainRound("first").total).toBe(1);
		expect(ledger.drainRound("second").total).toBe(0);
	});

	it("polls a bounded batch each tick", async () => {
		const { ingest, inbox, chat } = await setup();
		for (let i = 0; i < 12; i += 1) {
			inbox.push({ username: `viewer${i}`, text: "e2e4" });
		}

		expect(ingest.tick()).toHaveLength(10);
		expect(chat.pollMessages).toHaveBeenCalledWith(10);
		expect(ingest.tick()).toEqual(["move_vote", "move_vote"]);
		expect(ingest.tick()).toEqual([]);
	});
});

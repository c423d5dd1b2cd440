import { describe, expect, it } from "vitest";
import { parseIrcLine, toChatMessage } from "../src/irc";

describe("parseIrcLine", () => {
	it("parses tags, prefix, params and trailing text", () => {
		expect(
			parseIrcLine(
				"@badge-info=;display-name=Alice;mod=0 :alice!alice@alice.tmi.twitch.tv PRIVMSG #chan :hello there\r\n",
			),
		).toEqual({
			tags: { "badge-info": "", "display-name": "Alice", mod: "0" },
			prefix: "alice!alice@alice.tmi.twitch.tv",
			command: "PRIVMSG",
			params: ["#chan"],
			trailing: "hello there",
		});
	});

	it("parses server pings", () => {
		expect(parseIrcLine("PING :tmi.twitch.tv")).toEqual({
			tags: {},
			prefix: null,
			command: "PING",
			params: [],
			trailing: "tmi.twitch.tv",
		});
	});

	it("parses numeric replies", () => {
		expect(parseIrcLine(":tmi.twitch.tv 001 crowdbot :Welcome, GLHF!")).toEqual(
			{
				tags: {},
				prefix: "tmi.twitch.tv",
				command: "001",
				params: ["crowdbot"],
				trailing: "Welcome, GLHF!",
			},
		);
	});

	it("returns null for empty lines", () => {
		expect(parseIrcLine("")).toBeNull();
		expect(parseIrcLine(":prefix-only")).toBeNull();
	});
});

describe("toChatMessage", () => {
	it("takes the login name from the prefix", () => {
		const message = parseIrcLine(
			":bob!bob@bob.tmi.twitch.tv PRIVMSG #chan :Nf3",
		);
		expect(message && toChatMessage(message)).toEqual({
			username: "bob",
			text: "Nf3",
		});
	});

	it("unwraps /me actions", () => {
		const message = parseIrcLine(
			":bob!bob@bob.tmi.twitch.tv PRIVMSG #chan :\u0001ACTION e4\u0001",
		);
		expect(message && toChatMessage(message)).toEqual({
			username: "bob",
			text: "e4",
		});
	});

	it("ignores everything but chat lines", () => {
		const message = parseIrcLine(
			":bob!bob@bob.tmi.twitch.tv JOIN #chan",
		);
		expect(message && toChatMessage(message)).toBeNull();
	});
});

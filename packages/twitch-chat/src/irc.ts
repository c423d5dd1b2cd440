import type { ChatMessage } from "@crowdmove/core";

export type IrcMessage = {
	tags: Record<string, string>;
	prefix: string | null;
	command: string;
	params: string[];
	trailing: string | null;
};

const ACTION = /^\u0001ACTION (.*)\u0001$/;

const parseTags = (raw: string): Record<string, string> => {
	const tags: Record<string, string> = {};
	for (const pair of raw.split(";")) {
		const separator = pair.indexOf("=");
		if (separator === -1) {
			if (pair) tags[pair] = "";
			continue;
		}
		tags[pair.slice(0, separator)] = pair.slice(separator + 1);
	}
	return tags;
};

/**
 * Parses one IRC line, IRCv3 tags included:
 * `[@tags] [:prefix] COMMAND [params...] [:trailing]`.
 */
export const parseIrcLine = (line: string): IrcMessage | null => {
	let rest = line.replace(/\r?\n$/, "");
	let tags: Record<string, string> = {};
	let prefix: string | null = null;

	if (rest.startsWith("@")) {
		const space = rest.indexOf(" ");
		if (space === -1) return null;
		tags = parseTags(rest.slice(1, space));
		rest = rest.slice(space + 1).trimStart();
	}
	if (rest.startsWith(":")) {
		const space = rest.indexOf(" ");
		if (space === -1) return null;
		prefix = rest.slice(1, space);
		rest = rest.slice(space + 1).trimStart();
	}

	let trailing: string | null = null;
	const trailingStart = rest.indexOf(" :");
	if (trailingStart !== -1) {
		trailing = rest.slice(trailingStart + 2);
		rest = rest.slice(0, trailingStart);
	} else if (rest.startsWith(":")) {
		trailing = rest.slice(1);
		rest = "";
	}

	const [command, ...params] = rest.split(" ").filter(Boolean);
	if (!command) return null;
	return { tags, prefix, command: command.toUpperCase(), params, trailing };
};

/** Chat lines only; the username is the login name from the prefix. */
export const toChatMessage = (message: IrcMessage): ChatMessage | null => {
	if (message.command !== "PRIVMSG") return null;
	if (!message.prefix || message.trailing === null) return null;
	const username = message.prefix.split("!")[0];
	if (!username) return null;
	const action = ACTION.exec(message.trailing);
	return { username, text: action?.[1] ?? message.trailing };
};

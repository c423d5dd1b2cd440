/**
 * What a chat line asks for. `challenge` is recognised but reserved: it has
 * no effect yet.
 */
export type ChatIntent =
	| { kind: "resign" }
	| { kind: "challenge"; target: string | null }
	| { kind: "move"; text: string };

const MOVE_TOKEN = /^[A-Za-z0-9#+=\-!?]+$/;
const ANNOTATION_SUFFIX = /[!?]+$/;

const parseCommand = (text: string): ChatIntent | null => {
	const [command, argument] = text.split(/\s+/);
	switch (command) {
		case "!resign":
			return { kind: "resign" };
		case "!challenge":
			return { kind: "challenge", target: argument ?? null };
		default:
			return null;
	}
};

/** Returns null for anything that is neither a known command nor a move. */
export const parseChatLine = (raw: string): ChatIntent | null => {
	const text = raw.trim();
	if (text.length === 0) return null;
	if (text.startsWith("!")) return parseCommand(text);

	if (!MOVE_TOKEN.test(text)) return null;
	const move = text.replace(ANNOTATION_SUFFIX, "");
	if (move.length === 0) return null;
	return { kind: "move", text: move };
};

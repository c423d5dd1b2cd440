import type { LogLevel } from "@crowdmove/core";
import { z } from "zod";

export const DEFAULT_LICHESS_BASE_URL = "https://lichess.org";
export const DEFAULT_TWITCH_IRC_URL = "wss://irc-ws.chat.twitch.tv:443";
export const DEFAULT_OVERLAY_PATH = "./obs/info.json";

const envSchema = z.object({
	LICHESS_TOKEN: z.string().min(1),
	LICHESS_BASE_URL: z.string().url().default(DEFAULT_LICHESS_BASE_URL),
	TWITCH_CHANNEL: z.string().min(1),
	TWITCH_NICK: z.string().min(1),
	TWITCH_OAUTH_TOKEN: z.string().min(1),
	TWITCH_IRC_URL: z.string().url().default(DEFAULT_TWITCH_IRC_URL),
	OVERLAY_PATH: z.string().min(1).default(DEFAULT_OVERLAY_PATH),
	HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
	LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type BotConfig = {
	lichess: { token: string; baseUrl: string; timeoutMs: number };
	twitch: { channel: string; nick: string; oauthToken: string; url: string };
	overlayPath: string;
	logLevel: LogLevel;
};

export type ConfigOverrides = {
	overlayPath?: string;
	logLevel?: string;
};

export class ConfigError extends Error {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(
			["Invalid configuration:", ...issues.map((issue) => `  - ${issue}`)].join(
				"\n",
			),
		);
		this.name = "ConfigError";
		this.issues = issues;
	}
}

/** Blank variables count as unset, so `.env` templates can leave them empty. */
const withoutBlanks = (env: Record<string, string | undefined>) => {
	const cleaned: Record<string, string> = {};
	for (const [key, value] of Object.entries(env)) {
		if (value !== undefined && value.trim() !== "") cleaned[key] = value.trim();
	}
	return cleaned;
};

export const loadConfig = (
	env: Record<string, string | undefined>,
	overrides?: ConfigOverrides,
): BotConfig => {
	const parsed = envSchema.safeParse({
		...withoutBlanks(env),
		...withoutBlanks({
			OVERLAY_PATH: overrides?.overlayPath,
			LOG_LEVEL: overrides?.logLevel,
		}),
	});
	if (!parsed.success) {
		throw new ConfigError(
			parsed.error.issues.map(
				(issue) => `${issue.path.join(".")}: ${issue.message}`,
			),
		);
	}
	const vars = parsed.data;
	return {
		lichess: {
			token: vars.LICHESS_TOKEN,
			baseUrl: vars.LICHESS_BASE_URL,
			timeoutMs: vars.HTTP_TIMEOUT_MS,
		},
		twitch: {
			channel: vars.TWITCH_CHANNEL,
			nick: vars.TWITCH_NICK,
			oauthToken: vars.TWITCH_OAUTH_TOKEN,
			url: vars.TWITCH_IRC_URL,
		},
		overlayPath: vars.OVERLAY_PATH,
		logLevel: vars.LOG_LEVEL,
	};
};

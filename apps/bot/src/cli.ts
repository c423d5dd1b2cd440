import {
	BotRuntime,
	buildGameUrl,
	DEFAULT_TICKS,
	errorMessage,
	log,
	OverlayStore,
	setLogLevel,
} from "@crowdmove/core";
import { LichessClient } from "@crowdmove/lichess-client";
import { TwitchChatClient } from "@crowdmove/twitch-chat";
import { config as loadDotenv } from "dotenv";
import minimist from "minimist";
import { type BotConfig, ConfigError, loadConfig } from "./config";

type Args = ReturnType<typeof minimist>;

const usage = () => {
	console.log(
		[
			"crowdmove: Twitch chat plays a Lichess bot account",
			"",
			"Commands:",
			"  run        [--overlay <path>] [--log-level debug|info|warn|error]",
			"  status     print account totals and active games",
			"  challenge  <username> [--rated] [--clock 180] [--increment 2]",
		].join("\n"),
	);
};

const asString = (value: unknown): string | undefined =>
	typeof value === "string" && value.length > 0 ? value : undefined;

const asInt = (value: unknown, fallback: number): number => {
	if (typeof value !== "string" && typeof value !== "number") return fallback;
	const parsed = Number.parseInt(String(value), 10);
	if (!Number.isFinite(parsed)) return fallback;
	return parsed;
};

const createLichess = (config: BotConfig) =>
	new LichessClient({
		token: config.lichess.token,
		baseUrl: config.lichess.baseUrl,
		timeoutMs: config.lichess.timeoutMs,
		onLog: (event) => log("debug", event.message, event.details),
	});

const runBot = async (config: BotConfig) => {
	const lichess = createLichess(config);
	const account = await lichess.getAccount();
	if (!account.ok) {
		throw new Error(`Lichess session check failed: ${account.error}`);
	}
	log("info", "lichess_session_ready", { username: account.value.username });

	const gameUrlBase = lichess.getBaseUrl();
	const overlay = new OverlayStore(config.overlayPath, {
		defaultUrl: async () => {
			const last = await lichess.getLastGameId();
			if (!last.ok) {
				log("warn", "last_game_lookup_failed", { error: last.error });
				return buildGameUrl(gameUrlBase, "");
			}
			return buildGameUrl(gameUrlBase, last.value ?? "");
		},
	});

	const chat = new TwitchChatClient({
		channel: config.twitch.channel,
		nick: config.twitch.nick,
		oauthToken: config.twitch.oauthToken,
		url: config.twitch.url,
		reconnectMs: DEFAULT_TICKS.chatReconnectMs,
	});
	try {
		await chat.connect();
	} catch (error) {
		// The client keeps retrying in the background.
		log("warn", "chat_connect_failed", { error: errorMessage(error) });
	}

	const runtime = new BotRuntime({
		hosting: lichess,
		chat,
		overlay,
		gameUrlBase,
	});
	const controller = new AbortController();
	const stop = (signal: NodeJS.Signals) => {
		log("info", "shutdown_requested", { signal });
		controller.abort();
	};
	process.once("SIGINT", stop);
	process.once("SIGTERM", stop);

	try {
		await runtime.run(controller.signal);
	} finally {
		chat.close();
	}
};

const runStatus = async (config: BotConfig) => {
	const lichess = createLichess(config);
	const account = await lichess.getAccount();
	if (!account.ok) throw new Error(account.error);
	const games = await lichess.listActiveGames();
	if (!games.ok) throw new Error(games.error);
	console.log(
		JSON.stringify(
			{
				username: account.value.username,
				totals: account.value.totals,
				games: games.value,
			},
			null,
			2,
		),
	);
};

const runChallenge = async (config: BotConfig, args: Args) => {
	const username = asString(args._[1]);
	if (!username) {
		throw new Error("challenge requires a <username>");
	}
	const lichess = createLichess(config);
	const created = await lichess.createChallenge(username, {
		rated: args.rated === true,
		clockLimitSeconds: asInt(args.clock, 180),
		clockIncrementSeconds: asInt(args.increment, 2),
	});
	if (!created.ok) throw new Error(created.error);
	console.log(JSON.stringify(created.value, null, 2));
};

const main = async () => {
	const args = minimist(process.argv.slice(2), {
		boolean: ["rated", "help"],
		string: ["overlay", "log-level", "clock", "increment"],
	});
	const command = asString(args._[0]);
	if (!command || args.help === true) {
		usage();
		process.exit(command ? 0 : 1);
	}

	loadDotenv();
	const config = loadConfig(process.env, {
		overlayPath: asString(args.overlay),
		logLevel: asString(args["log-level"]),
	});
	setLogLevel(config.logLevel);

	switch (command) {
		case "run":
			await runBot(config);
			return;
		case "status":
			await runStatus(config);
			return;
		case "challenge":
			await runChallenge(config, args);
			return;
		default:
			usage();
			throw new Error(`Unknown command: ${command}`);
	}
};

main().catch((error) => {
	if (error instanceof ConfigError) {
		console.error(error.message);
	} else {
		log("error", "fatal", { error: errorMessage(error) });
	}
	process.exit(1);
});

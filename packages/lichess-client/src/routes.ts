export type RouteKey =
	| "account"
	| "account_playing"
	| "bot_move"
	| "bot_resign"
	| "challenge_accept"
	| "challenge_decline"
	| "challenge_create"
	| "users_status"
	| "games_user"
	| "stream_event";

export type RouteTable = Record<RouteKey, string>;

export const DEFAULT_ROUTES: RouteTable = {
	account: "/api/account",
	account_playing: "/api/account/playing",
	bot_move: "/api/bot/game/:gameId/move/:move",
	bot_resign: "/api/bot/game/:gameId/resign",
	challenge_accept: "/api/challenge/:challengeId/accept",
	challenge_decline: "/api/challenge/:challengeId/decline",
	challenge_create: "/api/challenge/:username",
	users_status: "/api/users/status",
	games_user: "/api/games/user/:username",
	stream_event: "/api/stream/event",
};

export type RouteParams = Record<string, string>;

export const createRouteResolver = (overrides?: Partial<RouteTable>) => {
	const table: RouteTable = { ...DEFAULT_ROUTES, ...overrides };
	return (key: RouteKey, params?: RouteParams) =>
		table[key].replace(/:([A-Za-z]+)/g, (match, name: string) => {
			const value = params?.[name];
			if (value === undefined) {
				throw new Error(`Missing route parameter "${name}" for ${key}.`);
			}
			return encodeURIComponent(value);
		});
};

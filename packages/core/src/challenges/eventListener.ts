import { sleep } from "../loop";
import { errorMessage, type Logger, log as defaultLog } from "../obs/log";
import type { GameRegistry } from "../registry/gameRegistry";
import { DEFAULT_TICKS } from "../ticks";
import type { HostingClient, HostingEvent } from "../types";
import type { ChallengeGatekeeper } from "./gatekeeper";

export type HostingEventListenerDeps = {
	hosting: Pick<HostingClient, "streamEvents">;
	gatekeeper: Pick<ChallengeGatekeeper, "decide">;
	registry: Pick<GameRegistry, "refresh">;
};

export type HostingEventListenerOptions = {
	reconnectMs?: number;
	log?: Logger;
};

export class HostingEventListener {
	private readonly deps: HostingEventListenerDeps;
	private readonly reconnectMs: number;
	private readonly log: Logger;

	constructor(
		deps: HostingEventListenerDeps,
		options?: HostingEventListenerOptions,
	) {
		this.deps = deps;
		this.reconnectMs = options?.reconnectMs ?? DEFAULT_TICKS.eventReconnectMs;
		this.log = options?.log ?? defaultLog;
	}

	async handle(event: HostingEvent): Promise<void> {
		switch (event.type) {
			case "challenge":
				await this.deps.gatekeeper.decide(event.challenge);
				return;
			case "gameStart":
			case "gameFinish":
				this.log("info", `hosting_${event.type}`, { gameId: event.gameId });
				await this.deps.registry.refresh();
				return;
			case "other":
				this.log("debug", "hosting_event_ignored", { event: event.name });
				return;
		}
	}

	/** Consumes the event stream, reconnecting whenever it ends or breaks. */
	async run(signal?: AbortSignal): Promise<void> {
		while (!signal?.aborted) {
			try {
				for await (const event of this.deps.hosting.streamEvents(signal)) {
					await this.handle(event);
					if (signal?.aborted) break;
				}
				if (!signal?.aborted) {
					this.log("warn", "event_stream_ended", {});
				}
			} catch (error) {
				if (signal?.aborted) break;
				this.log("warn", "event_stream_failed", {
					error: errorMessage(error),
				});
			}
			await sleep(this.reconnectMs, signal);
		}
	}
}

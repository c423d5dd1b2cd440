import { ArbiterPool } from "./arbiter/arbiterPool";
import type { ResignRule, SelectionPolicy } from "./arbiter/selection";
import { HostingEventListener } from "./challenges/eventListener";
import { ChallengeGatekeeper } from "./challenges/gatekeeper";
import { ChatIngestCoordinator } from "./chat/chatIngest";
import { VoteLedger } from "./ledger/voteLedger";
import { runEvery } from "./loop";
import { type Logger, log as defaultLog } from "./obs/log";
import { OverlayPublisher } from "./overlay/overlayPublisher";
import type { OverlayStore } from "./overlay/overlayStore";
import { GameRegistry } from "./registry/gameRegistry";
import { resolveTicks, type TickIntervals } from "./ticks";
import type { ChatClient, HostingClient } from "./types";
import { OpponentWatchdog } from "./watchdog/opponentWatchdog";

export type BotRuntimeOptions = {
	hosting: HostingClient;
	chat: ChatClient;
	overlay: Pick<OverlayStore, "read" | "update">;
	gameUrlBase: string;
	ticks?: Partial<TickIntervals>;
	selectionPolicy?: SelectionPolicy;
	resignRule?: ResignRule;
	chatBatchSize?: number;
	log?: Logger;
};

/** Every worker of the bot, sharing one registry and one ledger. */
export class BotRuntime {
	readonly registry: GameRegistry;
	readonly ledger: VoteLedger;
	readonly arbiters: ArbiterPool;
	readonly gatekeeper: ChallengeGatekeeper;
	readonly events: HostingEventListener;
	readonly watchdog: OpponentWatchdog;
	readonly chatIngest: ChatIngestCoordinator;
	readonly overlay: OverlayPublisher;
	readonly ticks: TickIntervals;
	private readonly log: Logger;

	constructor(options: BotRuntimeOptions) {
		const log = options.log ?? defaultLog;
		const { hosting } = options;
		this.log = log;
		this.ticks = resolveTicks(options.ticks);

		this.registry = new GameRegistry(hosting, { log });
		this.ledger = new VoteLedger(this.registry, { log });
		this.arbiters = new ArbiterPool(
			{ registry: this.registry, ledger: this.ledger, hosting },
			{
				selectionPolicy: options.selectionPolicy,
				resignRule: options.resignRule,
				tickMs: this.ticks.arbiterMs,
				log,
			},
		);
		this.gatekeeper = new ChallengeGatekeeper(
			{ registry: this.registry, hosting },
			{ log },
		);
		this.events = new HostingEventListener(
			{ hosting, gatekeeper: this.gatekeeper, registry: this.registry },
			{ reconnectMs: this.ticks.eventReconnectMs, log },
		);
		this.watchdog = new OpponentWatchdog(
			{ registry: this.registry, hosting },
			{ log },
		);
		this.chatIngest = new ChatIngestCoordinator(
			{ chat: options.chat, registry: this.registry, ledger: this.ledger },
			{ batchSize: options.chatBatchSize, log },
		);
		this.overlay = new OverlayPublisher(
			{ registry: this.registry, hosting, store: options.overlay },
			{ gameUrlBase: options.gameUrlBase, log },
		);
	}

	/** Resolves once `signal` aborts and every worker has wound down. */
	async run(signal: AbortSignal): Promise<void> {
		const loop = { signal, log: this.log };
		const { ticks } = this;
		this.log("info", "runtime_started", { ticks });

		await this.registry.refresh();
		await Promise.all([
			runEvery(
				"registry",
				ticks.registryMs,
				() => this.registry.refresh(),
				loop,
			),
			runEvery(
				"arbiter_supervisor",
				ticks.supervisorMs,
				() => this.arbiters.reconcile(),
				loop,
			),
			runEvery("watchdog", ticks.watchdogMs, () => this.watchdog.tick(), loop),
			runEvery("chat", ticks.chatMs, () => this.chatIngest.tick(), loop),
			runEvery("overlay", ticks.overlayMs, () => this.overlay.tick(), loop),
			this.events.run(signal),
		]);
		await this.arbiters.stop();
		this.log("info", "runtime_stopped", {});
	}
}

import { type Logger, log as defaultLog } from "../obs/log";
import type { GameRegistry } from "../registry/gameRegistry";
import { describeFailure } from "../result";
import type { HostingClient } from "../types";
import { buildGameUrl, gameIdFromUrl, type OverlayStore } from "./overlayStore";

export type OverlayPublisherDeps = {
	registry: Pick<GameRegistry, "snapshotIds">;
	hosting: Pick<HostingClient, "getAccountTotals">;
	store: Pick<OverlayStore, "read" | "update">;
};

export type OverlayPublisherOptions = {
	gameUrlBase: string;
	log?: Logger;
};

export class OverlayPublisher {
	private readonly deps: OverlayPublisherDeps;
	private readonly gameUrlBase: string;
	private readonly log: Logger;
	private lastUrl: string | null = null;
	private countersRefreshed = false;

	constructor(deps: OverlayPublisherDeps, options: OverlayPublisherOptions) {
		this.deps = deps;
		this.gameUrlBase = options.gameUrlBase;
		this.log = options.log ?? defaultLog;
	}

	get hasRefreshedCounters() {
		return this.countersRefreshed;
	}

	async tick(): Promise<void> {
		const gameIds = this.deps.registry.snapshotIds();
		const gameId = gameIds[0];

		if (gameId === undefined) {
			if (!this.countersRefreshed) await this.refreshCounters();
			return;
		}

		if (this.lastUrl === null) {
			const current = await this.deps.store.read();
			if (!current) return;
			this.lastUrl = current.url;
		}
		if (gameIdFromUrl(this.lastUrl) === gameId) return;

		const updated = await this.deps.store.update({
			url: buildGameUrl(this.gameUrlBase, gameId),
		});
		if (!updated) return;
		this.lastUrl = updated.url;
		this.countersRefreshed = false;
		this.log("info", "overlay_url_updated", { gameId, url: updated.url });
	}

	private async refreshCounters() {
		const totals = await this.deps.hosting.getAccountTotals();
		if (!totals.ok) {
			this.log("warn", "account_totals_failed", describeFailure(totals));
			return;
		}
		const updated = await this.deps.store.update({
			wins: totals.value.win,
			draws: totals.value.draw,
			losses: totals.value.loss,
		});
		if (!updated) return;
		this.lastUrl = updated.url;
		this.countersRefreshed = true;
		this.log("info", "overlay_counters_updated", {
			wins: updated.wins,
			draws: updated.draws,
			losses: updated.losses,
		});
	}
}

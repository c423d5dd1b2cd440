import { mkdir, readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { errorMessage, type Logger, log as defaultLog } from "../obs/log";

export const overlayStateSchema = z.object({
	wins: z.number().int(),
	losses: z.number().int(),
	draws: z.number().int(),
	url: z.string(),
});

export type OverlayState = z.infer<typeof overlayStateSchema>;

export type OverlayStoreOptions = {
	/** URL written when the file has to be recreated. */
	defaultUrl?: () => Promise<string>;
	log?: Logger;
};

export const gameIdFromUrl = (url: string) => url.split("/").pop() ?? "";

export const buildGameUrl = (gameUrlBase: string, gameId: string) =>
	`${gameUrlBase.replace(/\/+$/, "")}/${gameId}`;

/** The stream overlay's status file, read and rewritten whole. */
export class OverlayStore {
	readonly filePath: string;
	private readonly defaultUrl: () => Promise<string>;
	private readonly log: Logger;

	constructor(filePath: string, options?: OverlayStoreOptions) {
		this.filePath = filePath;
		this.defaultUrl = options?.defaultUrl ?? (async () => "");
		this.log = options?.log ?? defaultLog;
	}

	private async load(): Promise<OverlayState> {
		const raw = await readFile(this.filePath, "utf8");
		return overlayStateSchema.parse(JSON.parse(raw));
	}

	async write(state: OverlayState): Promise<void> {
		await mkdir(path.dirname(this.filePath), { recursive: true });
		await writeFile(this.filePath, JSON.stringify(state), "utf8");
	}

	async recreate(): Promise<OverlayState> {
		const state: OverlayState = {
			wins: 0,
			losses: 0,
			draws: 0,
			url: await this.defaultUrl(),
		};
		await this.write(state);
		this.log("info", "overlay_file_created", { path: this.filePath });
		return state;
	}

	/**
	 * Reads the file, recreating it once when it is missing or unreadable.
	 * Returns null if it still cannot be read after that.
	 */
	async read(): Promise<OverlayState | null> {
		try {
			return await this.load();
		} catch (error) {
			this.log("warn", "overlay_file_unreadable", {
				path: this.filePath,
				error: errorMessage(error),
			});
		}
		try {
			await this.recreate();
			return await this.load();
		} catch (error) {
			this.log("error", "overlay_file_unrecoverable", {
				path: this.filePath,
				error: errorMessage(error),
			});
			return null;
		}
	}

	async update(patch: Partial<OverlayState>): Promise<OverlayState | null> {
		const current = await this.read();
		if (!current) return null;
		const next = { ...current, ...patch };
		try {
			await this.write(next);
		} catch (error) {
			this.log("error", "overlay_write_failed", {
				path: this.filePath,
				error: errorMessage(error),
			});
			return null;
		}
		return next;
	}
}

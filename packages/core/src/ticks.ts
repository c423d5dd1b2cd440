export type TickIntervals = {
	registryMs: number;
	arbiterMs: number;
	supervisorMs: number;
	watchdogMs: number;
	chatMs: number;
	overlayMs: number;
	eventReconnectMs: number;
	chatReconnectMs: number;
};

export const DEFAULT_TICKS: TickIntervals = {
	registryMs: 1_000,
	arbiterMs: 500,
	supervisorMs: 500,
	watchdogMs: 500,
	chatMs: 200,
	overlayMs: 200,
	eventReconnectMs: 5_000,
	chatReconnectMs: 5_000,
};

export const resolveTicks = (
	overrides?: Partial<TickIntervals>,
): TickIntervals => ({ ...DEFAULT_TICKS, ...(overrides ?? {}) });

/**
 * FeedWatchdog — detects a silent order-event stream.
 *
 * Graduated status:
 * - Healthy: last event < warningMs ago
 * - Degraded: last event >= warningMs (the agent pulls an early snapshot)
 * - Critical: last event >= criticalMs (the agent pauses its grid)
 *
 * A quiet market is indistinguishable from a dead stream, so the agent also
 * touches the watchdog after every successful snapshot.
 */

import type { Clock } from "../shared/time.js";
import { Duration, SystemClock } from "../shared/time.js";
import { FeedStatus } from "./types.js";

export interface WatchdogConfig {
	readonly warningMs: number;
	readonly criticalMs: number;
}

export const DEFAULT_WATCHDOG_CONFIG: WatchdogConfig = {
	warningMs: Duration.seconds(15),
	criticalMs: Duration.seconds(30),
};

/** Warning at the configured silence, critical at twice that. */
export function watchdogConfigFor(feedSilenceMs: number): WatchdogConfig {
	return { warningMs: feedSilenceMs, criticalMs: feedSilenceMs * 2 };
}

export class FeedWatchdog {
	private lastTouchMs: number;
	private lastReported: FeedStatus;
	private readonly config: WatchdogConfig;
	private readonly clock: Clock;

	constructor(config: WatchdogConfig = DEFAULT_WATCHDOG_CONFIG, clock: Clock = SystemClock) {
		this.config = config;
		this.clock = clock;
		this.lastTouchMs = clock.now();
		this.lastReported = FeedStatus.Healthy;
	}

	/** Call on every event or snapshot to reset the timer */
	touch(): void {
		this.lastTouchMs = this.clock.now();
	}

	status(): FeedStatus {
		const elapsed = this.clock.now() - this.lastTouchMs;
		if (elapsed >= this.config.criticalMs) return FeedStatus.Critical;
		if (elapsed >= this.config.warningMs) return FeedStatus.Degraded;
		return FeedStatus.Healthy;
	}

	silenceMs(): number {
		return this.clock.now() - this.lastTouchMs;
	}

	/**
	 * @returns the new status when it differs from the one last returned here,
	 * else null
	 */
	poll(): { readonly from: FeedStatus; readonly to: FeedStatus } | null {
		const next = this.status();
		if (next === this.lastReported) return null;
		const change = { from: this.lastReported, to: next };
		this.lastReported = next;
		return change;
	}
}

import { describe, expect, it } from "vitest";
import { FakeClock } from "../shared/time.js";
import { AgentLifecycle } from "./agent-lifecycle.js";
import { AgentStatus, PauseReason, StatusErrorKind } from "./types.js";

function createLifecycle() {
	const clock = new FakeClock(1000);
	const lifecycle = new AgentLifecycle(clock);
	return { lifecycle, clock };
}

describe("AgentLifecycle", () => {
	it("starts Active and able to trade", () => {
		const { lifecycle } = createLifecycle();
		expect(lifecycle.status()).toBe(AgentStatus.Active);
		expect(lifecycle.canTrade()).toBe(true);
	});

	it("pauses and resumes", () => {
		const { lifecycle } = createLifecycle();
		const paused = lifecycle.transition({ type: "pause", reason: PauseReason.UserRequested });
		expect(paused.ok).toBe(true);
		expect(lifecycle.canTrade()).toBe(false);
		expect(lifecycle.snapshot().metadata).toEqual({
			type: "pause",
			reason: PauseReason.UserRequested,
		});

		lifecycle.transition({ type: "resume" });
		expect(lifecycle.status()).toBe(AgentStatus.Active);
		expect(lifecycle.snapshot().metadata).toEqual({ type: "none" });
	});

	it("stops from Paused", () => {
		const { lifecycle } = createLifecycle();
		lifecycle.transition({ type: "pause", reason: PauseReason.FeedCritical });
		const stopped = lifecycle.transition({ type: "stop", reason: "shutdown" });
		expect(stopped.ok).toBe(true);
		expect(lifecycle.isStopped()).toBe(true);
	});

	it("rejects resume while Active", () => {
		const { lifecycle } = createLifecycle();
		const result = lifecycle.transition({ type: "resume" });
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.kind).toBe(StatusErrorKind.InvalidTransition);
			expect(result.error.message).toBe("Cannot transition from active via resume");
		}
	});

	it("rejects pausing twice", () => {
		const { lifecycle } = createLifecycle();
		lifecycle.transition({ type: "pause", reason: PauseReason.UserRequested });
		const again = lifecycle.transition({ type: "pause", reason: PauseReason.UserRequested });
		expect(again.ok).toBe(false);
	});

	it("treats Stopped as terminal", () => {
		const { lifecycle } = createLifecycle();
		lifecycle.transition({ type: "stop", reason: "done" });
		const result = lifecycle.transition({ type: "stop", reason: "again" });
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.kind).toBe(StatusErrorKind.AlreadyStopped);
		expect(lifecycle.transition({ type: "resume" }).ok).toBe(false);
	});

	it("tracks time in status and history", () => {
		const { lifecycle, clock } = createLifecycle();
		clock.advance(500);
		lifecycle.transition({ type: "pause", reason: PauseReason.UserRequested });
		clock.advance(250);
		expect(lifecycle.timeInStatus()).toBe(250);
		expect(lifecycle.history()).toEqual([
			{ from: AgentStatus.Active, to: AgentStatus.Paused, transition: "pause", timestamp: 1500 },
		]);
	});

	it("bounds history", () => {
		const { lifecycle } = createLifecycle();
		for (let i = 0; i < 60; i++) {
			lifecycle.transition({ type: "pause", reason: PauseReason.UserRequested });
			lifecycle.transition({ type: "resume" });
		}
		expect(lifecycle.history()).toHaveLength(100);
	});
});

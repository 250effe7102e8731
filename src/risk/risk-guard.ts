import type { OrderIntent } from "../order/types.js";
import { IntentValidityGuard } from "./guards/intent-validity.js";
import { PositionLimitGuard } from "./guards/position-limit.js";
import type { IntentGuard, RiskContext, RiskVerdict } from "./types.js";
import { accept, clip } from "./types.js";

/**
 * Risk Guard — evaluates an order intent through a sequence of guards.
 *
 * Each guard sees the intent as left by the previous one (quantized, clipped).
 * The first reject stops evaluation; if any guard clipped, the final verdict is
 * a clip carrying the originally requested size.
 *
 * Evaluation is synchronous and side-effect free. The engine calls it when an
 * intent is emitted and again for follow-ups at the moment of the triggering
 * fill, each time with the position as of that instant.
 *
 * @example
 * ```ts
 * const guard = RiskGuard.standard();
 * const verdict = guard.evaluate(intent, { position, maxPosition, tickSize, lotSize });
 * if (verdict.type !== "reject") place(verdict.intent);
 * ```
 */
export class RiskGuard {
	private readonly guards: readonly IntentGuard[];

	private constructor(guards: readonly IntentGuard[]) {
		this.guards = guards;
	}

	static create(): RiskGuard {
		return new RiskGuard([]);
	}

	/** Validity first, so the limit check works on quantized sizes. */
	static standard(): RiskGuard {
		return RiskGuard.create().with(IntentValidityGuard.create()).with(PositionLimitGuard.create());
	}

	/** Appends a guard, returning a new RiskGuard. */
	with(guard: IntentGuard): RiskGuard {
		return new RiskGuard([...this.guards, guard]);
	}

	evaluate(intent: OrderIntent, ctx: RiskContext): RiskVerdict {
		let current = intent;
		let clippedBy: string | null = null;

		for (const guard of this.guards) {
			const verdict = guard.check(current, ctx);
			if (verdict.type === "reject") return verdict;
			if (verdict.type === "clip" && clippedBy === null) clippedBy = verdict.guard;
			current = verdict.intent;
		}

		return clippedBy === null ? accept(current) : clip(current, intent.size, clippedBy);
	}

	guardNames(): readonly string[] {
		return this.guards.map((g) => g.name);
	}
}

import type { OrderIntent } from "../../order/types.js";
import type { Decimal } from "../../shared/decimal.js";
import { PositionLimitExceededError } from "../../shared/errors.js";
import { OrderSide } from "../../shared/side.js";
import type { IntentGuard, RiskContext, RiskVerdict } from "../types.js";
import { accept, clip, reject } from "../types.js";

/**
 * Keeps |position + signed(size)| within the maximum net position.
 *
 * Headroom is `max - position` for bids and `max + position` for asks. An
 * intent larger than the headroom is clipped to it (rounded down to the lot);
 * no headroom, or a clip that rounds to zero, rejects the intent.
 *
 * An intent that reduces an over-limit position has headroom on its side and
 * passes, so the agent can always trade back towards the limit.
 */
export class PositionLimitGuard implements IntentGuard {
	readonly name = "PositionLimit";

	private constructor() {}

	static create(): PositionLimitGuard {
		return new PositionLimitGuard();
	}

	check(intent: OrderIntent, ctx: RiskContext): RiskVerdict {
		const headroom =
			intent.side === OrderSide.Bid
				? ctx.maxPosition.sub(ctx.position)
				: ctx.maxPosition.add(ctx.position);

		if (!headroom.isPositive()) {
			return reject(this.name, this.limitError(intent, ctx, headroom));
		}
		if (intent.size.lte(headroom)) {
			return accept(intent);
		}

		const clipped = headroom.floorTo(ctx.lotSize);
		if (!clipped.isPositive()) {
			return reject(this.name, this.limitError(intent, ctx, headroom));
		}
		return clip({ ...intent, size: clipped }, intent.size, this.name);
	}

	private limitError(
		intent: OrderIntent,
		ctx: RiskContext,
		headroom: Decimal,
	): PositionLimitExceededError {
		return new PositionLimitExceededError("no headroom under the maximum position", {
			side: intent.side,
			size: intent.size.toString(),
			position: ctx.position.toString(),
			maxPosition: ctx.maxPosition.toString(),
			headroom: headroom.toString(),
		});
	}
}

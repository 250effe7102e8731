import { OrderKind, type OrderIntent } from "../../order/types.js";
import { InvalidOrderIntentError } from "../../shared/errors.js";
import { OrderSide } from "../../shared/side.js";
import type { IntentGuard, RiskContext, RiskVerdict } from "../types.js";
import { accept, reject } from "../types.js";

/**
 * Quantizes an intent to the venue grid and rejects it when size or price is
 * not positive afterwards. Bid prices round down and ask prices round up, so
 * quantization never makes an order more aggressive.
 */
export class IntentValidityGuard implements IntentGuard {
	readonly name = "IntentValidity";

	private constructor() {}

	static create(): IntentValidityGuard {
		return new IntentValidityGuard();
	}

	check(intent: OrderIntent, ctx: RiskContext): RiskVerdict {
		const size = intent.size.floorTo(ctx.lotSize);
		if (!size.isPositive()) {
			return reject(
				this.name,
				new InvalidOrderIntentError("size is not positive after quantization", {
					size: intent.size.toString(),
					lotSize: ctx.lotSize.toString(),
				}),
			);
		}

		if (intent.kind === OrderKind.Market) {
			return accept({ ...intent, size, price: null });
		}

		if (intent.price === null) {
			return reject(this.name, new InvalidOrderIntentError("limit intent without a price"));
		}
		const price =
			intent.side === OrderSide.Bid
				? intent.price.floorTo(ctx.tickSize)
				: intent.price.ceilTo(ctx.tickSize);
		if (!price.isPositive()) {
			return reject(
				this.name,
				new InvalidOrderIntentError("price is not positive after quantization", {
					price: intent.price.toString(),
					tickSize: ctx.tickSize.toString(),
				}),
			);
		}
		return accept({ ...intent, size, price });
	}
}

/**
 * OrderSide — which side of the book an order rests on.
 *
 * Bids buy and add to the net position; asks sell and subtract from it.
 */

import { Decimal } from "./decimal.js";

export const OrderSide = {
	Bid: "bid",
	Ask: "ask",
} as const;

export type OrderSide = (typeof OrderSide)[keyof typeof OrderSide];

/** Return the opposite side (bid becomes ask and vice versa). */
export function oppositeSide(side: OrderSide): OrderSide {
	return side === OrderSide.Bid ? OrderSide.Ask : OrderSide.Bid;
}

/** +1 for bids, -1 for asks. */
export function sideSign(side: OrderSide): Decimal {
	return side === OrderSide.Bid ? Decimal.one() : Decimal.one().neg();
}

/** Signed position delta of trading `size` on `side`. */
export function signedSize(side: OrderSide, size: Decimal): Decimal {
	return side === OrderSide.Bid ? size : size.neg();
}

/** The side that reduces a position of the given sign; null when flat. */
export function closingSide(position: Decimal): OrderSide | null {
	if (position.isPositive()) return OrderSide.Ask;
	if (position.isNegative()) return OrderSide.Bid;
	return null;
}

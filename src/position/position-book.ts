/**
 * PositionBook — immutable net position with a running average entry.
 *
 * The position is derived from fills; it is never stored on its own. Fills on
 * the side that opens exposure move the weighted average entry; fills on the
 * opposite side realize P&L against it. All mutations return new instances.
 */

import { Decimal } from "../shared/decimal.js";
import { type OrderSide, signedSize } from "../shared/side.js";

/** Result of applying one fill to a PositionBook. */
export interface FillOutcome {
	readonly book: PositionBook;
	/** P&L realized by the closing part of the fill; zero when nothing was closed. */
	readonly realizedPnl: Decimal;
	/** Size of opposing exposure this fill closed. */
	readonly closedSize: Decimal;
}

export class PositionBook {
	/** Signed net size, positive = long. */
	readonly size: Decimal;
	/** Null while flat, or after a venue overwrite that reported no entry price. */
	readonly avgEntry: Decimal | null;
	/** Cumulative realized P&L since the book was created. */
	readonly realizedPnl: Decimal;

	private constructor(size: Decimal, avgEntry: Decimal | null, realizedPnl: Decimal) {
		this.size = size;
		this.avgEntry = avgEntry;
		this.realizedPnl = realizedPnl;
	}

	static flat(): PositionBook {
		return new PositionBook(Decimal.zero(), null, Decimal.zero());
	}

	static of(size: Decimal, avgEntry: Decimal | null): PositionBook {
		return new PositionBook(size, size.isZero() ? null : avgEntry, Decimal.zero());
	}

	isFlat(): boolean {
		return this.size.isZero();
	}

	/**
	 * @example
	 * // long 1 @ 99, sell 1 @ 100 → realized +1, flat
	 * PositionBook.of(d("1"), d("99")).applyFill("ask", d("1"), d("100"));
	 */
	applyFill(side: OrderSide, qty: Decimal, price: Decimal): FillOutcome {
		const delta = signedSize(side, qty);
		const opening = this.size.isZero() || this.size.isPositive() === delta.isPositive();

		if (opening) {
			const held = this.size.abs();
			const entry = this.avgEntry ?? price;
			const avg = held.mul(entry).add(qty.mul(price)).div(held.add(qty));
			return {
				book: new PositionBook(this.size.add(delta), avg, this.realizedPnl),
				realizedPnl: Decimal.zero(),
				closedSize: Decimal.zero(),
			};
		}

		const closedSize = Decimal.min(qty, this.size.abs());
		const entry = this.avgEntry ?? price;
		const direction = this.size.isPositive() ? Decimal.one() : Decimal.one().neg();
		const realized = closedSize.mul(price.sub(entry)).mul(direction);
		const nextSize = this.size.add(delta);

		let nextAvg: Decimal | null;
		if (nextSize.isZero()) {
			nextAvg = null;
		} else if (qty.gt(closedSize)) {
			// flipped through zero: the remainder opened at this fill's price
			nextAvg = price;
		} else {
			nextAvg = this.avgEntry;
		}

		return {
			book: new PositionBook(nextSize, nextAvg, this.realizedPnl.add(realized)),
			realizedPnl: realized,
			closedSize,
		};
	}

	/**
	 * Replace size (and entry, when known) with venue truth; realized P&L is kept.
	 * Without a venue entry the current one carries over only while the
	 * position keeps its direction.
	 */
	overwrite(size: Decimal, avgEntry: Decimal | null): PositionBook {
		if (size.isZero()) {
			return new PositionBook(size, null, this.realizedPnl);
		}
		const sameDirection = !this.size.isZero() && size.isPositive() === this.size.isPositive();
		return new PositionBook(size, avgEntry ?? (sameDirection ? this.avgEntry : null), this.realizedPnl);
	}
}

import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { ConfigurationError } from "../shared/errors.js";
import { planId } from "../shared/identifiers.js";
import { OrderSide } from "../shared/side.js";
import { levelStep, planGrid, shouldRecenter } from "./grid-planner.js";
import type { PlannerSettings } from "./types.js";

const d = Decimal.from;

function settings(overrides: Partial<PlannerSettings> = {}): PlannerSettings {
	return {
		levels: 3,
		distance: { mode: "percentage", value: d("1") },
		orderSize: d("1"),
		maxPosition: d("10"),
		tickSize: d("0.01"),
		lotSize: d("0.001"),
		minLevelSpacing: Decimal.zero(),
		...overrides,
	};
}

function prices(plan: ReturnType<typeof planGrid>, side: OrderSide): string[] {
	return plan.levels.filter((l) => l.side === side).map((l) => l.price.toString());
}

describe("planGrid", () => {
	it("builds the symmetric 1% ladder around 100", () => {
		const plan = planGrid(d("100"), settings(), planId("p-1"));

		expect(prices(plan, OrderSide.Bid)).toEqual(["99", "98", "97"]);
		expect(prices(plan, OrderSide.Ask)).toEqual(["101", "102", "103"]);
		expect(plan.levels.every((l) => l.size.eq(d("1")))).toBe(true);
		expect(plan.levels.map((l) => l.index)).toEqual([1, 2, 3, 1, 2, 3]);
		expect(plan.step.toString()).toBe("1");
		expect(plan.dropped).toEqual([]);
	});

	it("supports absolute distances", () => {
		const plan = planGrid(
			d("2500"),
			settings({ levels: 2, distance: { mode: "absolute", value: d("12.5") } }),
			planId("p-abs"),
		);
		expect(prices(plan, OrderSide.Bid)).toEqual(["2487.5", "2475"]);
		expect(prices(plan, OrderSide.Ask)).toEqual(["2512.5", "2525"]);
	});

	it("quantizes bids down and asks up to the tick", () => {
		const plan = planGrid(
			d("100.37"),
			settings({ levels: 1, tickSize: d("0.5") }),
			planId("p-tick"),
		);
		// step = 1.0037 → bid 99.3663 floors to 99; ask 101.3737 ceils to 101.5
		expect(prices(plan, OrderSide.Bid)).toEqual(["99"]);
		expect(prices(plan, OrderSide.Ask)).toEqual(["101.5"]);
	});

	it("quantizes sizes down to the lot", () => {
		const plan = planGrid(d("100"), settings({ orderSize: d("0.0159") }), planId("p-lot"));
		expect(plan.levels[0]?.size.toString()).toBe("0.015");
	});

	it("drops every level when the size rounds to zero", () => {
		const plan = planGrid(d("100"), settings({ orderSize: d("0.0004") }), planId("p-zero"));
		expect(plan.levels).toEqual([]);
		expect(plan.dropped).toHaveLength(6);
		expect(plan.dropped.every((l) => l.reason === "zero_size")).toBe(true);
	});

	it("caps the levels per side by the maximum position", () => {
		const plan = planGrid(d("100"), settings({ maxPosition: d("2.5") }), planId("p-cap"));
		expect(prices(plan, OrderSide.Bid)).toEqual(["99", "98"]);
		expect(prices(plan, OrderSide.Ask)).toEqual(["101", "102"]);
		expect(plan.dropped).toEqual([
			{ side: OrderSide.Bid, index: 3, reason: "position_cap" },
			{ side: OrderSide.Ask, index: 3, reason: "position_cap" },
		]);
	});

	it.each([
		["non-positive reference", d("0"), settings()],
		["zero levels", d("100"), settings({ levels: 0 })],
		["zero distance", d("100"), settings({ distance: { mode: "absolute", value: d("0") } })],
		[
			"bids below zero",
			d("100"),
			settings({ levels: 5, distance: { mode: "absolute", value: d("20") } }),
		],
		["spacing under tick", d("1"), settings({ distance: { mode: "percentage", value: d("0.5") } })],
		[
			"spacing under minimum",
			d("100"),
			settings({ minLevelSpacing: d("2") }),
		],
	])("throws ConfigurationError for %s", (_label, reference, config) => {
		expect(() => planGrid(reference, config, planId("p-bad"))).toThrow(ConfigurationError);
	});
});

describe("levelStep", () => {
	it("is a percentage of the reference or the absolute value", () => {
		expect(levelStep(d("250"), { mode: "percentage", value: d("0.4") }).toString()).toBe("1");
		expect(levelStep(d("250"), { mode: "absolute", value: d("3") }).toString()).toBe("3");
	});
});

describe("shouldRecenter", () => {
	it("fires only beyond the threshold", () => {
		expect(shouldRecenter(d("100"), d("102"), d("2"))).toBe(false);
		expect(shouldRecenter(d("100"), d("102.01"), d("2"))).toBe(true);
		expect(shouldRecenter(d("100"), d("97.5"), d("2"))).toBe(true);
	});

	it("is disabled by a zero threshold", () => {
		expect(shouldRecenter(d("100"), d("1000"), Decimal.zero())).toBe(false);
	});
});

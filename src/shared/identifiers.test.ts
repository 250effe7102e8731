import { describe, expect, it } from "vitest";
import { idToString, intentId, planId, userId, venueOrderId } from "./identifiers.js";

describe("branded identifiers", () => {
	it("trims and round-trips raw strings", () => {
		expect(idToString(intentId("  run1-7 "))).toBe("run1-7");
		expect(idToString(venueOrderId("V-100"))).toBe("V-100");
		expect(idToString(userId("acct-1"))).toBe("acct-1");
		expect(idToString(planId("plan-3"))).toBe("plan-3");
	});

	it.each([
		["IntentId", () => intentId("")],
		["VenueOrderId", () => venueOrderId("   ")],
		["UserId", () => userId("")],
		["PlanId", () => planId(" ")],
	])("%s rejects empty values", (label, make) => {
		expect(make).toThrow(`${label} cannot be empty`);
	});
});

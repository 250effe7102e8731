import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { userId } from "../shared/identifiers.js";
import { FakeClock } from "../shared/time.js";
import { MemoryAccountStore, MemoryProfitLogStore } from "./memory-store.js";
import { AccountStatus } from "./types.js";

describe("MemoryAccountStore", () => {
	it("upserts by user id without duplicating rows", async () => {
		const clock = new FakeClock(1_000);
		const store = new MemoryAccountStore(clock);
		const first = await store.upsert({
			userId: userId("u-1"),
			username: "alice",
			status: AccountStatus.Active,
		});
		clock.advance(500);
		const second = await store.upsert({
			userId: userId("u-1"),
			username: "bob",
			status: AccountStatus.Paused,
		});

		expect(store.size()).toBe(1);
		expect(second.id).toBe(first.id);
		expect(second.username).toBe("bob");
		expect(second.createdAt.getTime()).toBe(1_000);
		expect(second.updatedAt.getTime()).toBe(1_500);
	});

	it("returns null when setting the status of an unknown account", async () => {
		const store = new MemoryAccountStore();
		expect(await store.setStatus(userId("u-1"), AccountStatus.Stopped)).toBeNull();
	});
});

describe("MemoryProfitLogStore", () => {
	it("filters by creation time and limits", async () => {
		const clock = new FakeClock(1_000);
		const store = new MemoryProfitLogStore(clock);
		const row = { price: Decimal.from(100), position: Decimal.from(1), periodProfit: Decimal.from(1) };
		await store.append(row);
		clock.set(2_000);
		await store.append(row);
		await store.append(row);

		expect(await store.list({ since: new Date(2_000) })).toHaveLength(2);
		expect((await store.list({ limit: 2 })).map((r) => r.id)).toEqual([1, 2]);
	});
});

/**
 * Branded identifiers — compile-time separation of the ids the agent juggles.
 *
 * An intent id is minted locally before a request leaves the process; a venue
 * order id only exists once the exchange acknowledges it. Mixing them up is the
 * classic reconciliation bug, so the compiler keeps them apart.
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Locally generated order identifier, unique for the lifetime of an agent run. */
export type IntentId = Brand<string, "IntentId">;
/** Exchange-assigned order identifier, known after acknowledgement. */
export type VenueOrderId = Brand<string, "VenueOrderId">;
/** Opaque identifier of the account an agent trades for. */
export type UserId = Brand<string, "UserId">;
/** Identifier of one grid plan; bumps on every re-center. */
export type PlanId = Brand<string, "PlanId">;

// ── Factory functions with validation ────────────────────────────────

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** Create a validated IntentId. Throws if empty. */
export function intentId(value: string): IntentId {
	return createBrandedId(value, "IntentId");
}

/** Create a validated VenueOrderId. Throws if empty. */
export function venueOrderId(value: string): VenueOrderId {
	return createBrandedId(value, "VenueOrderId");
}

/** Create a validated UserId. Throws if empty. */
export function userId(value: string): UserId {
	return createBrandedId(value, "UserId");
}

export function planId(value: string): PlanId {
	return createBrandedId(value, "PlanId");
}

/** Extract the raw string from any branded identifier type. */
export function idToString(id: IntentId | VenueOrderId | UserId | PlanId): string {
	return id as string;
}

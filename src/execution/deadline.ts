import { TimeoutError, type TradingError, classifyError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { err } from "../shared/result.js";

/**
 * Bounds an outbound call by `ms`. On expiry the call's signal is aborted and
 * the result is a TimeoutError; the venue may still have acted on the request,
 * so callers resolve the outcome with a status query rather than assume failure.
 *
 * Thrown values are classified into TradingErrors.
 */
export async function withDeadline<T>(
	fn: (signal: AbortSignal) => Promise<Result<T, TradingError>>,
	ms: number,
	label: string,
	parent?: AbortSignal,
): Promise<Result<T, TradingError>> {
	const controller = new AbortController();
	const onParentAbort = (): void => controller.abort();
	parent?.addEventListener("abort", onParentAbort, { once: true });

	let timer: ReturnType<typeof setTimeout> | undefined;
	const expired = new Promise<Result<T, TradingError>>((resolve) => {
		timer = setTimeout(() => {
			controller.abort();
			resolve(err(new TimeoutError(`${label} exceeded ${ms}ms deadline`, { deadlineMs: ms })));
		}, ms);
	});

	try {
		const call = Promise.resolve()
			.then(() => fn(controller.signal))
			.catch((e: unknown) => err(classifyError(e)));
		return await Promise.race([call, expired]);
	} finally {
		clearTimeout(timer);
		parent?.removeEventListener("abort", onParentAbort);
	}
}

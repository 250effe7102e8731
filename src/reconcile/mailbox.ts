/**
 * Mailbox — single-consumer task queue for one account.
 *
 * Every mutation of an account's ledger runs as a mailbox task, one at a time,
 * in posting order. Network calls never run inside a task; their results are
 * posted back as new tasks, so a slow venue never holds the queue.
 *
 * A task that throws is reported to `onError` and the queue moves on.
 */

export type MailboxErrorHandler = (label: string, error: unknown) => void;

export class Mailbox {
	private tail: Promise<void> = Promise.resolve();
	private queued = 0;
	private readonly onError: MailboxErrorHandler;

	constructor(onError: MailboxErrorHandler) {
		this.onError = onError;
	}

	/** Resolves once `task` has run (or thrown). */
	post(label: string, task: () => void | Promise<void>): Promise<void> {
		this.queued++;
		const run = this.tail.then(async () => {
			try {
				await task();
			} catch (error) {
				this.onError(label, error);
			} finally {
				this.queued--;
			}
		});
		this.tail = run;
		return run;
	}

	/** Like `post`, but resolves with the task's value and rejects with its error. */
	run<T>(task: () => T | Promise<T>): Promise<T> {
		this.queued++;
		const run = this.tail.then(async () => {
			try {
				return await task();
			} finally {
				this.queued--;
			}
		});
		// the caller owns `run`'s rejection; the queue only waits for it
		this.tail = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}

	/** Tasks posted and not yet finished, including the running one. */
	depth(): number {
		return this.queued;
	}

	/** Resolves when everything posted so far has run. */
	idle(): Promise<void> {
		return this.tail;
	}
}

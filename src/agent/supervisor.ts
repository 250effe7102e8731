/**
 * AgentSupervisor — runs one GridAgent per account side by side.
 *
 * Agents share nothing but the stores they were given. One account failing
 * to start is reported and stopped; the others keep running.
 */

import type { Logger } from "../lib/logger/index.js";
import { StatusErrorKind } from "../lifecycle/types.js";
import { ConfigurationError, type TradingError, classifyError } from "../shared/errors.js";
import type { UserId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import { err, isErr, ok } from "../shared/result.js";
import type { GridAgent } from "./grid-agent.js";
import { type AgentHealth, type HealthAssessment, assessHealth } from "./health.js";

export interface StartOutcome {
	readonly account: UserId;
	readonly result: Result<void, TradingError>;
}

export interface AccountHealth {
	readonly health: AgentHealth;
	readonly assessment: HealthAssessment;
}

export class AgentSupervisor {
	private readonly agents: Map<UserId, GridAgent>;
	private readonly logger: Logger;

	private constructor(logger: Logger) {
		this.agents = new Map();
		this.logger = logger;
	}

	static create(options: { readonly logger: Logger }): AgentSupervisor {
		return new AgentSupervisor(options.logger);
	}

	/** @throws ConfigurationError when an agent for the same account is already registered */
	add(agent: GridAgent): void {
		if (this.agents.has(agent.account)) {
			throw new ConfigurationError("an agent for this account is already registered", {
				account: agent.account,
			});
		}
		this.agents.set(agent.account, agent);
	}

	get(account: UserId): GridAgent | null {
		return this.agents.get(account) ?? null;
	}

	size(): number {
		return this.agents.size;
	}

	/** Starts every agent in parallel. Agents that fail to start are stopped again. */
	async startAll(): Promise<readonly StartOutcome[]> {
		const agents = [...this.agents.values()];
		const settled = await Promise.allSettled(agents.map((agent) => agent.start()));

		const outcomes: StartOutcome[] = [];
		for (const [i, agent] of agents.entries()) {
			const outcome = settled[i];
			if (outcome === undefined || outcome.status === "fulfilled") {
				outcomes.push({ account: agent.account, result: ok(undefined) });
				continue;
			}
			const error = classifyError(outcome.reason);
			this.logger.error(
				{ account: agent.account, code: error.code, error: error.message },
				"agent failed to start",
			);
			await agent.stop("start failed");
			outcomes.push({ account: agent.account, result: err(error) });
		}
		return outcomes;
	}

	/** Stops every running agent in parallel. */
	async stopAll(reason = "shutdown"): Promise<void> {
		const agents = [...this.agents.values()];
		const settled = await Promise.allSettled(agents.map((agent) => agent.stop(reason)));

		for (const [i, agent] of agents.entries()) {
			const outcome = settled[i];
			if (outcome === undefined) continue;
			if (outcome.status === "rejected") {
				const error = classifyError(outcome.reason);
				this.logger.error(
					{ account: agent.account, code: error.code, error: error.message },
					"agent failed to stop cleanly",
				);
			} else if (isErr(outcome.value) && outcome.value.error.kind !== StatusErrorKind.AlreadyStopped) {
				this.logger.warn({ account: agent.account, error: outcome.value.error.message }, "stop refused");
			}
		}
	}

	health(): readonly AccountHealth[] {
		return [...this.agents.values()].map((agent) => {
			const health = agent.health();
			return { health, assessment: assessHealth(health) };
		});
	}
}

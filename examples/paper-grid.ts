/**
 * Paper Grid Example
 *
 * Runs one agent against the in-process PaperExchange:
 * - builds the grid around the venue's mark price
 * - walks the price down and up so levels fill and re-arm
 * - prints health and the profit log, then stops and cancels its orders
 */

import {
	Decimal,
	GridAgent,
	PaperExchange,
	assessHealth,
	createLogger,
	memoryStores,
	parseAgentConfig,
	sleep,
} from "../src/index.js";

const config = parseAgentConfig({
	account: { userId: "paper-1", username: "paper" },
	grid: {
		symbol: "ETH-PERP",
		levels: 4,
		distance: { mode: "percentage", value: 0.5 },
		orderSize: "0.1",
		maxPosition: "0.4",
		recenterThreshold: 3,
	},
});

const logger = createLogger({ level: "info", base: { service: "paper-grid" } });
const exchange = new PaperExchange({ lastPrice: Decimal.from("2000") });
const stores = memoryStores();
const agent = GridAgent.create({ config, adapter: exchange, stores, logger });

agent.events.on("fill", ({ order, fill }) => {
	console.log(`fill ${order.side} ${fill.size.toString()} @ ${fill.price.toString()}`);
});

await agent.start();

for (const price of ["1995", "1988", "1992", "2004", "2011", "2000"]) {
	exchange.cross(Decimal.from(price));
	await sleep(50);
	const health = agent.health();
	console.log(`mark ${price}: position ${health.position}, open ${health.openOrders}`);
}

const health = agent.health();
console.log(assessHealth(health));
console.log(await stores.profits.list({ limit: 20 }));

await agent.stop("example finished");

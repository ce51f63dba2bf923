/**
 * Example: guarding a flaky service
 *
 * A complete example showing how to:
 * 1. Create a breaker that trips after three consecutive failures
 * 2. Log its events as JSON lines
 * 3. Serve a fallback while the circuit is open
 * 4. Watch it probe and recover after the open timeout
 */

import { setTimeout as sleep } from "node:timers/promises";
import {
  attachBreakerLogger,
  consecutiveFailures,
  createCircuitBreaker,
  formatState,
  isCircuitOpen,
  LogLevel,
  logBreakerMetrics,
  StructuredLogger,
} from "../src/index.js";

const FAILURE_PROBABILITY = 0.6;
const REQUESTS = 20;
const REQUEST_INTERVAL_MS = 500;

/** Pretend downstream call that fails most of the time. */
async function callInventoryService(requestId: number): Promise<string> {
  await sleep(50);
  if (Math.random() < FAILURE_PROBABILITY) {
    throw new Error(`inventory service unavailable (request ${requestId})`);
  }
  return `stock level for request ${requestId}`;
}

async function main() {
  const logger = new StructuredLogger({ level: LogLevel.DEBUG, component: "circuit_breaker" });

  const breaker = createCircuitBreaker(
    {
      name: "inventory",
      failureThreshold: consecutiveFailures(3),
      successThreshold: 2,
      timeoutMs: 5_000,
    },
    { logger },
  );
  const detach = attachBreakerLogger(breaker, logger);

  for (let i = 1; i <= REQUESTS; i++) {
    const result = await breaker.executeWithFallback(
      () => callInventoryService(i),
      (error) => (isCircuitOpen(error) ? "cached stock level" : "unknown stock level"),
    );
    console.log(`#${i} [${formatState(breaker.state)}] ${result}`);
    await sleep(REQUEST_INTERVAL_MS);
  }

  logBreakerMetrics(logger, breaker.metrics());
  detach();
  breaker.shutdown();
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});

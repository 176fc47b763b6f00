/**
 * Example: polling a custom operation
 *
 * Shows the session core without Xcode:
 * 1. Implement an OperationFactory that reports fragments and log text
 * 2. Start it under a DeltaUpdateManager
 * 3. Poll with the previous snapshot's cursor until the session is terminal
 */

import { setTimeout as sleep } from "node:timers/promises";
import {
  DeltaUpdateManager,
  isTerminalState,
  LogLevel,
  type OperationContext,
  type OperationFactory,
  type OperationHandle,
  StructuredLogger,
} from "../src/index.js";

interface CountdownRequest {
  from: number;
  intervalMs: number;
}

/** Counts down to zero, one fragment per tick. */
class CountdownOperation implements OperationFactory<CountdownRequest, number> {
  start(request: CountdownRequest, { reporter, signal }: OperationContext<number>): OperationHandle {
    const tick = (n: number) => {
      if (signal.aborted) {
        reporter.log("stopped early\n");
        reporter.finish({ status: "cancelled" });
        return;
      }
      reporter.fragment(n);
      reporter.log(`tick ${n}\n`);
      if (n === 0) {
        reporter.finish({ status: "completed" });
        return;
      }
      setTimeout(() => tick(n - 1), request.intervalMs);
    };
    tick(request.from);
    // The signal is already aborted when cancel() runs; the next tick sees it
    return { cancel: () => undefined };
  }
}

async function main(): Promise<void> {
  const logger = new StructuredLogger({ component: "countdown", level: LogLevel.INFO });
  const manager = new DeltaUpdateManager({
    operation: new CountdownOperation(),
    config: { reaper: { retentionMs: 60_000 } },
    logger,
  });
  manager.start();

  const sessionId = await manager.startSession({ from: 5, intervalMs: 200 }, { sessionId: "countdown" });

  let snapshot = manager.poll(sessionId);
  while (true) {
    for (const value of snapshot.results) console.log(`fragment: ${value}`);
    if (snapshot.logOutput) process.stdout.write(snapshot.logOutput);
    if (isTerminalState(snapshot.state)) break;
    await sleep(500);
    snapshot = manager.poll(sessionId, snapshot.cursor);
  }

  console.log(`finished as ${snapshot.state}`);
  await manager.stop();
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});

import { NoopLogger } from "../adapters/noop-logger.js";
import { DeltaUpdateManager } from "../core/delta-update-manager.js";
import type { Logger } from "../interfaces/logger.js";
import type { MetricsCollector } from "../interfaces/metrics.js";
import type { ManagerConfig } from "../types/config.js";
import type { CancelReason, DeltaCursorInput, DeltaSnapshot, SessionInfo } from "../types/delta.js";
import type {
  TemporaryDirectory,
  TestRunUpdate,
  XCTestBundleStorage,
  XCTestDelta,
  XCTestTarget,
} from "./types.js";
import { XCTestOperationFactory, type XCTestRunHandle } from "./xctest-operation.js";
import { parseXCTestRunRequest, type XCTestRunRequest } from "./xctest-request.js";

export interface XCTestManagerOptions {
  target: XCTestTarget;
  bundleStorage: XCTestBundleStorage;
  temporaryDirectory: TemporaryDirectory;
  config?: ManagerConfig;
  logger?: Logger;
  metrics?: MetricsCollector;
  generateSessionId?: () => string;
}

/**
 * Delta update manager for XCTest runs on one target. Session directories,
 * and the result bundles in them, are removed when their session is reaped
 * or the manager stops.
 */
export class XCTestDeltaUpdateManager {
  readonly target: XCTestTarget;
  readonly sessions: DeltaUpdateManager<XCTestRunRequest, TestRunUpdate, XCTestRunHandle>;

  private readonly operation: XCTestOperationFactory;
  private readonly logger: Logger;

  constructor(options: XCTestManagerOptions) {
    this.target = options.target;
    this.logger = options.logger ?? new NoopLogger();
    this.operation = new XCTestOperationFactory({
      target: options.target,
      bundleStorage: options.bundleStorage,
      temporaryDirectory: options.temporaryDirectory,
      logger: this.logger,
    });
    this.sessions = new DeltaUpdateManager({
      operation: this.operation,
      config: options.config,
      logger: this.logger,
      metrics: options.metrics,
      generateSessionId: options.generateSessionId,
    });
    this.sessions.on("session:reaped", ({ sessionId }) => {
      this.operation.release(sessionId).catch((error: unknown) => {
        this.logger.warn(`Failed to remove the directory of ${sessionId}`, { sessionId, error });
      });
    });
  }

  start(): void {
    this.sessions.start();
  }

  async stop(): Promise<void> {
    await this.sessions.stop();
    await this.operation.releaseAll();
  }

  /**
   * Validate `input` as an XCTest run request and start it.
   * @throws InvalidRequestError, AlreadyExistsError, SessionLimitError
   */
  async startSession(input: unknown): Promise<string> {
    const request = parseXCTestRunRequest(input);
    return this.sessions.startSession(request, { sessionId: request.sessionId });
  }

  poll(sessionId: string, since?: DeltaCursorInput): XCTestDelta {
    return this.withResultBundle(this.sessions.poll(sessionId, since));
  }

  terminate(sessionId: string, reason?: CancelReason): SessionInfo {
    return this.sessions.terminate(sessionId, reason);
  }

  async waitForTerminal(sessionId: string, signal?: AbortSignal): Promise<XCTestDelta> {
    return this.withResultBundle(await this.sessions.waitForTerminal(sessionId, signal));
  }

  getSessionInfo(sessionId: string): SessionInfo {
    return this.sessions.getSessionInfo(sessionId);
  }

  listSessions(): SessionInfo[] {
    return this.sessions.listSessions();
  }

  private withResultBundle(snapshot: DeltaSnapshot<TestRunUpdate>): XCTestDelta {
    const handle = this.sessions.operationHandle(snapshot.identifier);
    return { ...snapshot, resultBundlePath: handle?.resultBundlePath ?? null };
  }
}

/** Manager for XCTest execution against `target`. */
export function createXCTestManager(options: XCTestManagerOptions): XCTestDeltaUpdateManager {
  return new XCTestDeltaUpdateManager(options);
}

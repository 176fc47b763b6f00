import { join } from "node:path";
import { errorMessage, OperationFailedError, StorageError, XcdeltaError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type {
  OperationContext,
  OperationFactory,
  OperationHandle,
  OperationOutcome,
} from "../interfaces/operation.js";
import type {
  TemporaryDirectory,
  TestRunUpdate,
  XCTestBundleDescriptor,
  XCTestBundleStorage,
  XCTestRunPlan,
  XCTestTarget,
} from "./types.js";
import type { XCTestRunRequest } from "./xctest-request.js";

export const RESULT_BUNDLE_NAME = "result.xcresult";

/** Handle of one XCTest run. */
export class XCTestRunHandle implements OperationHandle {
  readonly sessionId: string;
  readonly workingDirectory: string;
  readonly resultBundlePath: string;
  /** Settles once the run has reported its outcome. Never rejects. */
  completion: Promise<void> = Promise.resolve();

  private readonly controller: AbortController;

  constructor(sessionId: string, workingDirectory: string, controller: AbortController) {
    this.sessionId = sessionId;
    this.workingDirectory = workingDirectory;
    this.resultBundlePath = join(workingDirectory, RESULT_BUNDLE_NAME);
    this.controller = controller;
  }

  cancel(): void {
    this.controller.abort();
  }
}

export interface XCTestOperationFactoryOptions {
  target: XCTestTarget;
  bundleStorage: XCTestBundleStorage;
  temporaryDirectory: TemporaryDirectory;
  logger: Logger;
}

/**
 * Runs XCTest requests on a target: resolves the bundle, prepares a session
 * directory for the result bundle, and streams finished test methods and
 * output into the session.
 */
export class XCTestOperationFactory
  implements OperationFactory<XCTestRunRequest, TestRunUpdate, XCTestRunHandle>
{
  private readonly target: XCTestTarget;
  private readonly bundleStorage: XCTestBundleStorage;
  private readonly temporaryDirectory: TemporaryDirectory;
  private readonly logger: Logger;
  private readonly directories = new Map<string, string>();

  constructor(options: XCTestOperationFactoryOptions) {
    this.target = options.target;
    this.bundleStorage = options.bundleStorage;
    this.temporaryDirectory = options.temporaryDirectory;
    this.logger = options.logger;
  }

  async start(
    request: XCTestRunRequest,
    context: OperationContext<TestRunUpdate>,
  ): Promise<XCTestRunHandle> {
    const { sessionId, signal } = context;
    const bundle = await this.resolveBundle(request.testBundleId);
    const workingDirectory = await this.createDirectory(sessionId);
    if (signal.aborted) {
      throw new OperationFailedError(`Test run ${sessionId} was cancelled before it started`);
    }

    const controller = new AbortController();
    signal.addEventListener("abort", () => controller.abort(), { once: true });
    const handle = new XCTestRunHandle(sessionId, workingDirectory, controller);
    const plan: XCTestRunPlan = {
      sessionId,
      bundle,
      request,
      workingDirectory,
      resultBundlePath: handle.resultBundlePath,
    };

    this.logger.info(`Running ${bundle.bundleId} on ${this.target.udid}`, {
      sessionId,
      mode: request.mode.kind,
      resultBundlePath: handle.resultBundlePath,
    });
    handle.completion = this.run(plan, context, controller).catch((error: unknown) => {
      this.logger.error(`Reporting the outcome of ${sessionId} failed`, { sessionId, error });
    });
    return handle;
  }

  /** Remove the session directory and the result bundle inside it. */
  async release(sessionId: string): Promise<void> {
    const directory = this.directories.get(sessionId);
    if (directory === undefined) return;
    this.directories.delete(sessionId);
    await this.temporaryDirectory.remove(directory);
  }

  /** Remove every session directory still held. */
  async releaseAll(): Promise<void> {
    const sessionIds = Array.from(this.directories.keys());
    await Promise.all(sessionIds.map((sessionId) => this.release(sessionId)));
  }

  private async run(
    plan: XCTestRunPlan,
    context: OperationContext<TestRunUpdate>,
    controller: AbortController,
  ): Promise<void> {
    const { reporter } = context;
    const timeoutSeconds = plan.request.timeoutSeconds;
    let timedOut = false;
    const timer =
      timeoutSeconds === undefined
        ? null
        : setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, timeoutSeconds * 1000);

    let outcome: OperationOutcome;
    try {
      await this.target.runTests(
        plan,
        {
          testCaseFinished: (update) => reporter.fragment(update),
          output: (text) => reporter.log(text),
        },
        controller.signal,
      );
      outcome = this.outcomeAfterRun(plan, timedOut, controller.signal, null);
    } catch (error) {
      outcome = this.outcomeAfterRun(plan, timedOut, controller.signal, error);
    } finally {
      if (timer) clearTimeout(timer);
    }
    reporter.finish(outcome);
  }

  private outcomeAfterRun(
    plan: XCTestRunPlan,
    timedOut: boolean,
    signal: AbortSignal,
    error: unknown,
  ): OperationOutcome {
    if (timedOut) {
      return {
        status: "failed",
        error: new OperationFailedError(
          `Test run exceeded its timeout of ${plan.request.timeoutSeconds}s`,
        ),
      };
    }
    if (signal.aborted) return { status: "cancelled" };
    if (error === null) return { status: "completed" };

    this.logger.warn(`Test run ${plan.sessionId} failed`, { sessionId: plan.sessionId, error });
    return {
      status: "failed",
      error: new OperationFailedError(`Test run failed: ${errorMessage(error)}`, { cause: error }),
    };
  }

  private async resolveBundle(bundleId: string): Promise<XCTestBundleDescriptor> {
    try {
      return await this.bundleStorage.resolveTestBundle(bundleId);
    } catch (error) {
      if (error instanceof XcdeltaError) throw error;
      throw new StorageError(`Failed to resolve test bundle ${bundleId}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async createDirectory(sessionId: string): Promise<string> {
    let directory: string;
    try {
      directory = await this.temporaryDirectory.createSessionDirectory(sessionId);
    } catch (error) {
      if (error instanceof XcdeltaError) throw error;
      throw new StorageError(`Failed to create a directory for ${sessionId}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    this.directories.set(sessionId, directory);
    return directory;
  }
}

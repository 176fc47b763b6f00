/**
 * xcdelta public API barrel.
 *
 * Re-exports the session core, the XCTest binding, adapters and the HTTP
 * transport that make up the public surface of the `xcdelta` package.
 * @module
 */

// Adapters
export { CompositeMetricsCollector } from "./adapters/composite-metrics-collector.js";
export { ConsoleMetricsCollector } from "./adapters/console-metrics-collector.js";
export { DirectoryBundleStorage } from "./adapters/directory-bundle-storage.js";
export { NodeProcessManager } from "./adapters/node-process-manager.js";
export { NodeTemporaryDirectory } from "./adapters/node-temporary-directory.js";
export { NoopLogger } from "./adapters/noop-logger.js";
export { PrometheusMetricsCollector } from "./adapters/prometheus-metrics-collector.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, parseLogLevel, StructuredLogger } from "./adapters/structured-logger.js";
export { XcodebuildOutputParser } from "./adapters/xcodebuild-output-parser.js";
export type { XcodebuildTargetOptions } from "./adapters/xcodebuild-target.js";
export { XcodebuildTarget } from "./adapters/xcodebuild-target.js";
// Configuration
export type { ManagerConfigInput } from "./config/config-schema.js";
export { managerConfigSchema } from "./config/config-schema.js";
// Core
export type { DeltaSessionOptions, SessionStateChange } from "./core/delta-session.js";
export { DeltaSession } from "./core/delta-session.js";
export type {
  DeltaUpdateManagerEventMap,
  DeltaUpdateManagerOptions,
  StartSessionOptions,
} from "./core/delta-update-manager.js";
export { DeltaUpdateManager, sessionIdSchema } from "./core/delta-update-manager.js";
export type { InMemorySessionRegistryOptions } from "./core/in-memory-session-registry.js";
export { InMemorySessionRegistry } from "./core/in-memory-session-registry.js";
export type { SessionReaper, SessionReaperDeps } from "./core/interfaces/session-reaper.js";
export type { SessionRegistry } from "./core/interfaces/session-registry.js";
export type { SessionState, TerminalSessionState } from "./core/session-lifecycle.js";
export { isTerminalState, SESSION_STATES } from "./core/session-lifecycle.js";
export { TerminalSessionReaper } from "./core/session-reaper.js";
export { TypedEventEmitter } from "./core/typed-emitter.js";
// Errors
export type { SerializedError } from "./errors.js";
export {
  AlreadyExistsError,
  errorMessage,
  InvalidRequestError,
  NotFoundError,
  OperationFailedError,
  ProcessError,
  SessionLimitError,
  StorageError,
  serializeError,
  toXcdeltaError,
  XcdeltaError,
} from "./errors.js";
// HTTP
export type { SessionService } from "./http/api-sessions.js";
export { serializeSnapshot } from "./http/api-sessions.js";
export type { HealthContext } from "./http/health.js";
export type { HttpServerOptions } from "./http/server.js";
export { createRequestHandler, createXcdeltaServer } from "./http/server.js";
// Interfaces
export type { LogContext, Logger } from "./interfaces/logger.js";
export type { MetricsCollector, MetricsEventType, MetricsStats } from "./interfaces/metrics.js";
export type {
  OperationContext,
  OperationFactory,
  OperationHandle,
  OperationOutcome,
  OperationReporter,
  SessionOperationStarter,
} from "./interfaces/operation.js";
export type { ProcessHandle, ProcessManager, SpawnOptions } from "./interfaces/process-manager.js";
// Types
export type { ManagerConfig, ResolvedConfig } from "./types/config.js";
export { DEFAULT_CONFIG, resolveConfig } from "./types/config.js";
export type {
  CancelReason,
  DeltaCursor,
  DeltaCursorInput,
  DeltaSnapshot,
  SessionInfo,
} from "./types/delta.js";
// Utilities
export { LineBuffer, readLines } from "./utils/line-buffer.js";
// XCTest
export type {
  TemporaryDirectory,
  TestRunFailure,
  TestRunStatus,
  TestRunUpdate,
  XCTestBundleDescriptor,
  XCTestBundleStorage,
  XCTestDelta,
  XCTestRunListener,
  XCTestRunPlan,
  XCTestTarget,
} from "./xctest/types.js";
export type { XCTestManagerOptions } from "./xctest/xctest-manager.js";
export { createXCTestManager, XCTestDeltaUpdateManager } from "./xctest/xctest-manager.js";
export { RESULT_BUNDLE_NAME, XCTestOperationFactory, XCTestRunHandle } from "./xctest/xctest-operation.js";
export type {
  XCTestMode,
  XCTestRunRequest,
  XCTestRunRequestInput,
} from "./xctest/xctest-request.js";
export { parseXCTestRunRequest, xctestRunRequestSchema } from "./xctest/xctest-request.js";

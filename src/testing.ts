/**
 * Public test utilities: exported from the `"xcdelta/testing"` entry point.
 * Consumers can import these helpers to test code built on xcdelta without
 * Xcode, simulators or child processes.
 */
export { NoopLogger } from "./adapters/noop-logger.js";
export type {
  FakeOperation,
  FakeOperationHandle,
  FakeOperationOptions,
  ScriptStep,
} from "./testing/fake-operation.js";
export { FakeOperationFactory } from "./testing/fake-operation.js";
export type { FakeRunStep, FakeTargetRun, FakeXCTestTargetOptions } from "./testing/fake-xctest.js";
export {
  FakeBundleStorage,
  FakeTemporaryDirectory,
  FakeXCTestTarget,
  testRunUpdate,
} from "./testing/fake-xctest.js";
export type { MockProcessHandle } from "./testing/mock-process-manager.js";
export { MockProcessManager } from "./testing/mock-process-manager.js";

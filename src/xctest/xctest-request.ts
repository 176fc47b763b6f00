import { z } from "zod";
import { sessionIdSchema } from "../core/delta-update-manager.js";
import { InvalidRequestError } from "../errors.js";

const bundleIdSchema = z
  .string()
  .min(1)
  .max(255)
  .regex(/^[A-Za-z0-9._-]+$/, "must be a bundle identifier");

/** `Class` or `Class/method`. */
const testFilterSchema = z
  .string()
  .min(1)
  .regex(/^[^\s/]+(\/[^\s/]+)?$/, "must be Class or Class/method");

const testModeSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("logic") }).strict(),
  z.object({ kind: z.literal("application"), appBundleId: bundleIdSchema }).strict(),
  z
    .object({
      kind: z.literal("ui"),
      appBundleId: bundleIdSchema,
      testHostAppBundleId: bundleIdSchema,
    })
    .strict(),
]);

export const xctestRunRequestSchema = z
  .object({
    sessionId: sessionIdSchema.optional(),
    testBundleId: bundleIdSchema,
    mode: testModeSchema,
    testsToRun: z.array(testFilterSchema).optional(),
    testsToSkip: z.array(testFilterSchema).optional(),
    environment: z.record(z.string()).default({}),
    arguments: z.array(z.string()).default([]),
    timeoutSeconds: z.number().int().positive().optional(),
    reportActivities: z.boolean().default(false),
    collectCoverage: z.boolean().default(false),
    collectLogs: z.boolean().default(false),
    waitForDebugger: z.boolean().default(false),
  })
  .strict()
  .superRefine((request, ctx) => {
    const skipped = new Set(request.testsToSkip ?? []);
    for (const test of request.testsToRun ?? []) {
      if (skipped.has(test)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["testsToSkip"],
          message: `${test} is both run and skipped`,
        });
      }
    }
  });

export type XCTestRunRequest = z.output<typeof xctestRunRequestSchema>;
export type XCTestRunRequestInput = z.input<typeof xctestRunRequestSchema>;
export type XCTestMode = XCTestRunRequest["mode"];

/** Validate an untrusted request body. */
export function parseXCTestRunRequest(input: unknown): XCTestRunRequest {
  const result = xctestRunRequestSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidRequestError(
      "Invalid XCTest run request",
      result.error.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`),
    );
  }
  return result.data;
}

import pino from "pino";
import { getConfig, isTest } from "../config/index.js";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger shared by the validator and scripts.
 *
 * Redaction paths are centralized in src/utils/logger-config.ts. Writes to
 * stderr so script output on stdout stays machine-readable.
 */
export const log = pino(createLoggerConfig(getConfig().runtime.logLevel), pino.destination(2));

export type TelemetryData = Record<string, string | number | boolean | null | undefined>;

/**
 * Test sink for capturing telemetry events in tests.
 * Only used when NODE_ENV=test or VITEST=true
 */
let testSink: ((eventName: string, data: TelemetryData) => void) | null = null;

export function setTestSink(sink: ((eventName: string, data: TelemetryData) => void) | null): void {
  if (!isTest()) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT rename without updating log queries that filter on them
 */
export const TelemetryEvents = {
  CatalogLoaded: "downmix.catalog.loaded",

  ValidationStarted: "downmix.validate.started",
  ValidationCompleted: "downmix.validate.completed",
  ValidationAborted: "downmix.validate.aborted",

  PackLoaded: "downmix.pack.loaded",
  PackRejected: "downmix.pack.rejected",

  FixtureCompleted: "downmix.fixture.completed",

  MatrixResolved: "downmix.matrix.resolved",
} as const;

export type TelemetryEvent = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

export const VALID_EVENT_NAMES: Set<string> = new Set(Object.values(TelemetryEvents));

/**
 * Emit a telemetry event to the test sink (if installed) and the log.
 */
export function emit(event: TelemetryEvent, data: TelemetryData): void {
  if (testSink) {
    testSink(event, data);
  }
  log.info({ event, ...data });
}

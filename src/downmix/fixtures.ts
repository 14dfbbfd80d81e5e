/**
 * Policy-validation fixtures.
 *
 * A fixture names a registry and the issue counts a validation run over it
 * must produce, plus issues that must appear at least `count_min` times.
 */

import { readdir, readFile } from "node:fs/promises";
import { dirname, extname, join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import type { Catalog } from "./catalog.js";
import { isIssueId, SEVERITIES, type ValidationReport } from "./types.js";
import { validateRegistry, type ValidateOptions } from "./validator.js";

export class FixtureLoadError extends Error {
  readonly name = "FixtureLoadError";

  constructor(
    message: string,
    public readonly file: string,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FixtureLoadError);
    }
  }
}

const CountSchema = z.number().int().min(0);

const MustIncludeSchema = z.object({
  issue_id: z.string().refine(isIssueId, { message: "Unknown issue_id" }),
  severity: z.enum(SEVERITIES),
  count_min: CountSchema.default(1),
});

export const PolicyFixtureSchema = z.object({
  fixture_id: z.string().min(1),
  fixture_type: z.literal("policy_validation"),
  inputs: z.object({
    registry_file: z.string().min(1),
  }),
  expected: z.object({
    issue_counts: z.object({
      error: CountSchema,
      warn: CountSchema,
    }),
    must_include: z.array(MustIncludeSchema).default([]),
  }),
});

export type PolicyFixtureDocument = z.infer<typeof PolicyFixtureSchema>;

export interface PolicyFixture extends PolicyFixtureDocument {
  /** Absolute path of the fixture file. */
  file: string;
  /** Registry path resolved against the fixture's directory. */
  registryFile: string;
}

export interface FixtureResult {
  fixture_id: string;
  passed: boolean;
  failures: string[];
  report: ValidationReport;
}

const FIXTURE_EXTENSIONS = new Set([".yaml", ".yml", ".json"]);

export async function loadFixture(path: string): Promise<PolicyFixture> {
  const file = resolve(path);
  let raw: string;
  try {
    raw = await readFile(file, "utf-8");
  } catch (error) {
    throw new FixtureLoadError(`Cannot read fixture: ${file}`, file, error);
  }

  let doc: unknown;
  try {
    doc = parseYaml(raw);
  } catch (error) {
    throw new FixtureLoadError(`Fixture is not well-formed structured data: ${file}`, file, error);
  }

  const parsed = PolicyFixtureSchema.safeParse(doc);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new FixtureLoadError(`Fixture malformed: ${file}: ${details}`, file, parsed.error);
  }

  return {
    ...parsed.data,
    file,
    registryFile: resolve(dirname(file), parsed.data.inputs.registry_file),
  };
}

/**
 * Validate the fixture's registry and compare against its expectations.
 */
export async function runFixture(
  fixture: PolicyFixture,
  catalog: Catalog,
  options: ValidateOptions = {}
): Promise<FixtureResult> {
  const report = await validateRegistry(fixture.registryFile, catalog, options);
  const failures: string[] = [];

  for (const severity of SEVERITIES) {
    const expected = fixture.expected.issue_counts[severity];
    const actual = report.issue_counts[severity];
    if (expected !== actual) {
      failures.push(`issue_counts.${severity}: expected ${expected}, got ${actual}`);
    }
  }

  for (const want of fixture.expected.must_include) {
    const found = report.issues.filter(
      (issue) => issue.issue_id === want.issue_id && issue.severity === want.severity
    ).length;
    if (found < want.count_min) {
      failures.push(`must_include ${want.issue_id} (${want.severity}): expected at least ${want.count_min}, got ${found}`);
    }
  }

  const passed = failures.length === 0;
  emit(TelemetryEvents.FixtureCompleted, {
    fixture_id: fixture.fixture_id,
    passed,
    failures: failures.length,
  });
  return { fixture_id: fixture.fixture_id, passed, failures, report };
}

/**
 * Fixture files directly under `dir`, sorted by name.
 */
export async function discoverFixtures(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && FIXTURE_EXTENSIONS.has(extname(entry.name)))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(resolve(dir), name));
}

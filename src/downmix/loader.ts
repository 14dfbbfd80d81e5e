/**
 * Registry and policy-pack loaders.
 *
 * Loaders read and parse documents and check their top-level shape. They
 * report into the run's IssueCollector and return `null` when the document
 * cannot be used further. Pack `file` paths resolve against the directory
 * containing the registry, never the working directory.
 */

import { readFile } from "node:fs/promises";
import { dirname, isAbsolute, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { IssueCollector } from "./issues.js";
import { ISSUE_IDS } from "./types.js";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const RegistryRootSchema = z.object({
  downmix: z
    .object({
      _meta: z.record(z.unknown()),
      policies: z.record(z.unknown()),
      default_policy_by_source_layout: z.record(z.unknown()),
      conversions: z.array(z.unknown()),
      composition_paths: z.array(z.unknown()).nullish(),
    })
    .passthrough(),
});

const PackRootSchema = z.object({
  downmix_policy_pack: z.record(z.unknown()),
});

const SEMVER_RE = /^\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?(?:\+[0-9A-Za-z.-]+)?$/;

export function isValidSemver(v: string): boolean {
  return SEMVER_RE.test(v);
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function describeZodIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

export interface RegistryDocument {
  /** Absolute path of the registry file. */
  file: string;
  /** Directory every relative pack `file` resolves against. */
  dir: string;
  meta: Record<string, unknown>;
  policies: Record<string, unknown>;
  defaults: Record<string, unknown>;
  conversions: unknown[];
  compositionPaths: unknown[];
}

export interface PolicyPackDocument {
  file: string;
  /** Registry key that referenced this pack. */
  policyKey: string;
  policyId?: string;
  packVersion?: string;
  /** Raw matrix entries, sorted by matrix ID; `null` when `matrices` is unusable. */
  matrices: ReadonlyMap<string, unknown> | null;
  supportsSourceLayouts: unknown;
  supportsTargetLayouts: unknown;
}

type ReadOutcome =
  | { kind: "ok"; value: unknown }
  | { kind: "missing" }
  | { kind: "unreadable"; message: string }
  | { kind: "unparseable"; message: string };

function isFileMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readStructuredDocument(file: string): Promise<ReadOutcome> {
  let raw: string;
  try {
    raw = await readFile(file, "utf-8");
  } catch (error) {
    if (isFileMissing(error)) return { kind: "missing" };
    return { kind: "unreadable", message: error instanceof Error ? error.message : String(error) };
  }
  try {
    // JSON documents are valid YAML and parse through the same path.
    return { kind: "ok", value: parseYaml(raw) };
  } catch (error) {
    return { kind: "unparseable", message: error instanceof Error ? error.message : String(error) };
  }
}

export function resolvePackPath(registryDir: string, file: string): string {
  return isAbsolute(file) ? file : resolve(registryDir, file);
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/**
 * Load the root registry. Any issue raised here is fatal for the run.
 */
export async function loadRegistryDocument(
  registryFile: string,
  issues: IssueCollector
): Promise<RegistryDocument | null> {
  const file = resolve(registryFile);
  const outcome = await readStructuredDocument(file);

  switch (outcome.kind) {
    case "missing":
      issues.error(ISSUE_IDS.PolicyFileMissing, "DMX.REG.001", `Registry file not found: ${file}`, {
        file,
      });
      return null;
    case "unreadable":
    case "unparseable":
      issues.error(
        ISSUE_IDS.PolicyParseError,
        "DMX.REG.001",
        `Registry is not well-formed structured data: ${outcome.message}`,
        { file }
      );
      return null;
    case "ok":
      break;
  }

  const parsed = RegistryRootSchema.safeParse(outcome.value);
  if (!parsed.success) {
    issues.error(
      ISSUE_IDS.PolicySchemaInvalid,
      "DMX.REG.002",
      "Registry root must be a 'downmix' mapping with _meta, policies, default_policy_by_source_layout and conversions",
      { file, details: describeZodIssues(parsed.error) }
    );
    return null;
  }

  const root = parsed.data.downmix;
  return {
    file,
    dir: dirname(file),
    meta: root._meta,
    policies: root.policies,
    defaults: root.default_policy_by_source_layout,
    conversions: root.conversions,
    compositionPaths: root.composition_paths ?? [],
  };
}

// ---------------------------------------------------------------------------
// Policy packs
// ---------------------------------------------------------------------------

/**
 * Load one policy pack. Issues are scoped to this pack; a `null` result
 * leaves sibling policies unaffected.
 */
export async function loadPolicyPackDocument(
  file: string,
  policyKey: string,
  issues: IssueCollector
): Promise<PolicyPackDocument | null> {
  const outcome = await readStructuredDocument(file);
  const evidence = { file, policy_id: policyKey };

  switch (outcome.kind) {
    case "missing":
      issues.error(
        ISSUE_IDS.PolicyFileMissing,
        "DMX.REG.011",
        `Policy pack file not found for ${policyKey}: ${file}`,
        evidence
      );
      return null;
    case "unreadable":
    case "unparseable":
      issues.error(
        ISSUE_IDS.PolicyParseError,
        "DMX.PACK.001",
        `Policy pack is not well-formed structured data: ${outcome.message}`,
        evidence
      );
      return null;
    case "ok":
      break;
  }

  const parsed = PackRootSchema.safeParse(outcome.value);
  if (!parsed.success) {
    issues.error(
      ISSUE_IDS.PolicyParseError,
      "DMX.PACK.001",
      "Policy pack root must contain a 'downmix_policy_pack' mapping",
      { ...evidence, details: describeZodIssues(parsed.error) }
    );
    return null;
  }

  const root = parsed.data.downmix_policy_pack;

  let policyId: string | undefined;
  if (typeof root.policy_id === "string" && root.policy_id.length > 0) {
    policyId = root.policy_id;
    if (policyId !== policyKey) {
      issues.error(
        ISSUE_IDS.PolicyIdMismatch,
        "DMX.REG.013",
        `Policy pack declares policy_id ${policyId} but is registered as ${policyKey}`,
        { ...evidence, field: "downmix_policy_pack.policy_id", expected: policyKey, actual: policyId }
      );
    }
  } else {
    issues.error(ISSUE_IDS.PolicySchemaInvalid, "DMX.PACK.002", "Policy pack missing policy_id", {
      ...evidence,
      field: "downmix_policy_pack.policy_id",
    });
  }

  let packVersion: string | undefined;
  if (typeof root.pack_version === "string" && isValidSemver(root.pack_version)) {
    packVersion = root.pack_version;
  } else {
    issues.error(
      ISSUE_IDS.PolicySchemaInvalid,
      "DMX.PACK.002",
      root.pack_version === undefined
        ? "Policy pack missing pack_version"
        : `Policy pack pack_version is not a semantic version: ${String(root.pack_version)}`,
      { ...evidence, field: "downmix_policy_pack.pack_version" }
    );
  }

  let matrices: Map<string, unknown> | null = null;
  if (isRecord(root.matrices)) {
    const raw = root.matrices;
    matrices = new Map(
      Object.keys(raw)
        .sort()
        .map((id): [string, unknown] => [id, raw[id]])
    );
  } else {
    issues.error(
      ISSUE_IDS.PolicySchemaInvalid,
      "DMX.PACK.002",
      "Policy pack 'matrices' must be a mapping of matrix_id to matrix",
      { ...evidence, field: "downmix_policy_pack.matrices" }
    );
  }

  return {
    file,
    policyKey,
    ...(policyId !== undefined ? { policyId } : {}),
    ...(packVersion !== undefined ? { packVersion } : {}),
    matrices,
    supportsSourceLayouts: root.supports_source_layouts,
    supportsTargetLayouts: root.supports_target_layouts,
  };
}

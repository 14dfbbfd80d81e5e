/**
 * Downmix registry validation run.
 *
 * Registry load -> policy/default/conversion/path parsing -> pack loads
 * (optionally concurrent) -> matrix checks -> conversion and composition
 * checks. Every finding lands in one IssueCollector whose sorted output is
 * the report, so pack load order never shows in the result.
 */

import { resolve } from "node:path";
import { getConfig } from "../config/index.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import type { Catalog } from "./catalog.js";
import {
  parseCompositionPaths,
  toCompositionPath,
  validateCompositionPaths,
} from "./composition-validator.js";
import { IssueCollector } from "./issues.js";
import { loadPolicyPackDocument, loadRegistryDocument } from "./loader.js";
import { validatePackMatrices } from "./matrix-validator.js";
import {
  checkSupportsList,
  parseConversions,
  validateConversionMatrices,
  validateDefaults,
  validatePolicyEntries,
  type PolicySource,
} from "./registry-validator.js";
import type {
  CompositionPath,
  Conversion,
  PolicyEntry,
  PolicyPack,
  Registry,
  ValidationReport,
} from "./types.js";

export interface ValidateOptions {
  /** Load policy packs concurrently. Defaults to DOWNMIX_PARALLEL_LOAD. */
  parallel?: boolean;
}

export interface ValidationRun {
  report: ValidationReport;
  catalog: Catalog;
  /** `null` when the root registry could not be loaded. */
  registry: Registry | null;
  /** Packs with a usable `matrices` mapping, keyed by policy ID. */
  packs: ReadonlyMap<string, PolicyPack>;
}

interface PackOutcome {
  source: PolicySource;
  pack: PolicyPack | null;
  declaredSupports: { source?: readonly string[]; target?: readonly string[] };
  issues: IssueCollector;
}

async function loadPack(source: PolicySource, file: string, catalog: Catalog): Promise<PackOutcome> {
  const issues = new IssueCollector();
  const declaredSupports: PackOutcome["declaredSupports"] = {};
  const doc = await loadPolicyPackDocument(file, source.policyId, issues);

  let pack: PolicyPack | null = null;
  if (doc) {
    const evidence = { file, policy_id: source.policyId };
    if (doc.supportsSourceLayouts !== undefined) {
      declaredSupports.source = checkSupportsList(
        doc.supportsSourceLayouts,
        { ...evidence, field: "downmix_policy_pack.supports_source_layouts" },
        catalog,
        issues
      );
    }
    if (doc.supportsTargetLayouts !== undefined) {
      declaredSupports.target = checkSupportsList(
        doc.supportsTargetLayouts,
        { ...evidence, field: "downmix_policy_pack.supports_target_layouts" },
        catalog,
        issues
      );
    }
    pack = validatePackMatrices(doc, catalog, issues);
  }

  emit(pack ? TelemetryEvents.PackLoaded : TelemetryEvents.PackRejected, {
    policy_id: source.policyId,
    file,
    matrices: pack ? pack.matrices.size : 0,
    issues: issues.size,
  });
  return { source, pack, declaredSupports, issues };
}

function layoutsUsed(pack: PolicyPack | null, side: "source" | "target"): string[] {
  if (!pack) return [];
  const ids = new Set<string>();
  for (const matrix of pack.matrices.values()) {
    const id = side === "source" ? matrix.source_layout_id : matrix.target_layout_id;
    if (id !== undefined) ids.add(id);
  }
  return [...ids].sort();
}

function toPolicyEntry(outcome: PackOutcome | undefined, source: PolicySource): PolicyEntry {
  const pack = outcome?.pack ?? null;
  return {
    policy_id: source.policyId,
    ...(source.file !== null ? { file: source.file } : {}),
    ...(source.label !== undefined ? { label: source.label } : {}),
    supports_source_layouts:
      source.supportsSourceLayouts ?? outcome?.declaredSupports.source ?? layoutsUsed(pack, "source"),
    supports_target_layouts:
      source.supportsTargetLayouts ?? outcome?.declaredSupports.target ?? layoutsUsed(pack, "target"),
  };
}

/**
 * Validate a registry and everything it references.
 */
export async function runValidation(
  registryFile: string,
  catalog: Catalog,
  options: ValidateOptions = {}
): Promise<ValidationRun> {
  const startedAt = Date.now();
  const parallel = options.parallel ?? getConfig().downmix.parallelLoad;
  const issues = new IssueCollector();

  emit(TelemetryEvents.ValidationStarted, { registry_file: resolve(registryFile), parallel });

  const doc = await loadRegistryDocument(registryFile, issues);
  if (!doc) {
    const report = issues.toReport(resolve(registryFile));
    emit(TelemetryEvents.ValidationAborted, {
      registry_file: report.registry_file,
      rule_id: report.issues[0]?.rule_id,
    });
    return { report, catalog, registry: null, packs: new Map() };
  }

  const sources = validatePolicyEntries(doc, catalog, issues);
  const defaults = validateDefaults(doc, catalog, issues);
  const conversions = parseConversions(doc, defaults, catalog, issues);
  const pathRecords = parseCompositionPaths(doc, catalog, issues);

  const loadable = sources.flatMap((source) => (source.file !== null ? [{ source, file: source.file }] : []));
  let outcomes: PackOutcome[];
  if (parallel) {
    outcomes = await Promise.all(loadable.map(({ source, file }) => loadPack(source, file, catalog)));
  } else {
    outcomes = [];
    for (const { source, file } of loadable) {
      outcomes.push(await loadPack(source, file, catalog));
    }
  }

  const packs = new Map<string, PolicyPack>();
  const outcomeByPolicy = new Map<string, PackOutcome>();
  for (const outcome of outcomes) {
    issues.merge(outcome.issues);
    outcomeByPolicy.set(outcome.source.policyId, outcome);
    if (outcome.pack) packs.set(outcome.source.policyId, outcome.pack);
  }

  const registeredPolicies = new Set(sources.map((s) => s.policyId));
  validateConversionMatrices(doc.file, conversions, packs, issues);
  validateCompositionPaths(doc.file, pathRecords, packs, defaults, registeredPolicies, issues);

  const registry: Registry = {
    file: doc.file,
    dir: doc.dir,
    meta: Object.freeze({ ...doc.meta }),
    policies: new Map(
      sources.map((source): [string, PolicyEntry] => [
        source.policyId,
        toPolicyEntry(outcomeByPolicy.get(source.policyId), source),
      ])
    ),
    default_policy_by_source_layout: defaults,
    conversions: conversions.map(
      ({ unknownLayouts: _unknown, ...conversion }): Conversion => conversion
    ),
    composition_paths: pathRecords
      .map(toCompositionPath)
      .filter((path): path is CompositionPath => path !== null),
  };

  const report = issues.toReport(doc.file);
  emit(TelemetryEvents.ValidationCompleted, {
    registry_file: doc.file,
    policies: sources.length,
    packs_loaded: packs.size,
    errors: report.issue_counts.error,
    warnings: report.issue_counts.warn,
    duration_ms: Date.now() - startedAt,
  });

  return { report, catalog, registry, packs };
}

/**
 * Validate a registry and return only the ordered report.
 */
export async function validateRegistry(
  registryFile: string,
  catalog: Catalog,
  options: ValidateOptions = {}
): Promise<ValidationReport> {
  const run = await runValidation(registryFile, catalog, options);
  return run.report;
}

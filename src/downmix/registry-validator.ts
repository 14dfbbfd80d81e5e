/**
 * Structural and reference checks over the registry document: policy
 * entries, default policies, conversions and supports lists.
 */

import type { Catalog } from "./catalog.js";
import type { IssueCollector } from "./issues.js";
import { isRecord, resolvePackPath, type RegistryDocument } from "./loader.js";
import {
  ISSUE_IDS,
  POLICY_ID_PREFIX,
  isPolicyId,
  type Conversion,
  type IssueEvidence,
  type PolicyPack,
} from "./types.js";

export interface PolicySource {
  policyId: string;
  /** Absolute pack path; `null` when the entry gives none. */
  file: string | null;
  label?: string;
  supportsSourceLayouts?: readonly string[];
  supportsTargetLayouts?: readonly string[];
}

// ---------------------------------------------------------------------------
// Supports lists
// ---------------------------------------------------------------------------

/**
 * Check a declared `supports_*_layouts` list. Returns the list when it is a
 * list of strings, whether or not every layout is known.
 */
export function checkSupportsList(
  value: unknown,
  evidence: IssueEvidence & { field: string },
  catalog: Catalog,
  issues: IssueCollector
): readonly string[] | undefined {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    issues.error(
      ISSUE_IDS.PolicySchemaInvalid,
      "DMX.REG.014",
      `${evidence.field} must be a list of layout IDs`,
      evidence
    );
    return undefined;
  }
  for (const layoutId of value) {
    if (!catalog.hasLayout(layoutId)) {
      issues.error(
        ISSUE_IDS.LayoutUnknown,
        "DMX.REG.014",
        `${evidence.field} references unknown layout: ${layoutId}`,
        { ...evidence, layout_id: layoutId }
      );
    }
  }
  return value;
}

// ---------------------------------------------------------------------------
// Policies
// ---------------------------------------------------------------------------

/**
 * Check every `policies[*]` entry and resolve its pack path against the
 * registry's directory.
 */
export function validatePolicyEntries(
  doc: RegistryDocument,
  catalog: Catalog,
  issues: IssueCollector
): PolicySource[] {
  const sources: PolicySource[] = [];

  for (const policyId of Object.keys(doc.policies).sort()) {
    const entry = doc.policies[policyId];
    const evidence = { file: doc.file, policy_id: policyId };

    if (!isPolicyId(policyId)) {
      issues.error(
        ISSUE_IDS.PolicySchemaInvalid,
        "DMX.REG.010",
        `Policy ID must start with ${POLICY_ID_PREFIX}: ${policyId}`,
        { ...evidence, field: `downmix.policies.${policyId}` }
      );
    }

    if (!isRecord(entry)) {
      issues.error(
        ISSUE_IDS.PolicySchemaInvalid,
        "DMX.REG.010",
        `Policy entry must be a mapping: ${policyId}`,
        { ...evidence, field: `downmix.policies.${policyId}` }
      );
      sources.push({ policyId, file: null });
      continue;
    }

    let file: string | null = null;
    if (typeof entry.file === "string" && entry.file.length > 0) {
      file = resolvePackPath(doc.dir, entry.file);
    } else {
      issues.error(
        ISSUE_IDS.PolicyFileMissing,
        "DMX.REG.011",
        `Policy ${policyId} has no pack file`,
        { ...evidence, field: `downmix.policies.${policyId}.file` }
      );
    }

    const source: PolicySource = { policyId, file };
    if (typeof entry.label === "string") source.label = entry.label;

    if (entry.supports_source_layouts !== undefined) {
      const list = checkSupportsList(
        entry.supports_source_layouts,
        { ...evidence, field: `downmix.policies.${policyId}.supports_source_layouts` },
        catalog,
        issues
      );
      if (list) source.supportsSourceLayouts = list;
    }
    if (entry.supports_target_layouts !== undefined) {
      const list = checkSupportsList(
        entry.supports_target_layouts,
        { ...evidence, field: `downmix.policies.${policyId}.supports_target_layouts` },
        catalog,
        issues
      );
      if (list) source.supportsTargetLayouts = list;
    }

    sources.push(source);
  }

  return sources;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/**
 * Check `default_policy_by_source_layout`. Returns the entries whose value
 * names a registered policy.
 *
 * An unknown policy reuses DOWNMIX_POLICY_ID_MISMATCH; there is no separate
 * code for it.
 */
export function validateDefaults(
  doc: RegistryDocument,
  catalog: Catalog,
  issues: IssueCollector
): Map<string, string> {
  const defaults = new Map<string, string>();

  for (const layoutId of Object.keys(doc.defaults).sort()) {
    const value = doc.defaults[layoutId];
    const evidence = {
      file: doc.file,
      field: `downmix.default_policy_by_source_layout.${layoutId}`,
    };

    if (!catalog.hasLayout(layoutId)) {
      issues.error(
        ISSUE_IDS.LayoutUnknown,
        "DMX.REG.020",
        `Default policy declared for unknown layout: ${layoutId}`,
        { ...evidence, layout_id: layoutId }
      );
    }

    if (typeof value !== "string" || !Object.hasOwn(doc.policies, value)) {
      issues.error(
        ISSUE_IDS.PolicyIdMismatch,
        "DMX.REG.020",
        `Default policy for ${layoutId} is not a registered policy: ${String(value)}`,
        { ...evidence, layout_id: layoutId, actual: String(value) }
      );
      continue;
    }

    defaults.set(layoutId, value);
  }

  return defaults;
}

// ---------------------------------------------------------------------------
// Conversions
// ---------------------------------------------------------------------------

export interface ConversionRecord extends Conversion {
  /** Sides whose layout ID the catalog does not know. */
  unknownLayouts: ReadonlySet<"source" | "target">;
}

/**
 * Check each conversion's fields independently. Conversions that name a
 * source, target and matrix are returned for matrix checks.
 */
export function parseConversions(
  doc: RegistryDocument,
  defaults: ReadonlyMap<string, string>,
  catalog: Catalog,
  issues: IssueCollector
): ConversionRecord[] {
  const records: ConversionRecord[] = [];

  for (const [index, raw] of doc.conversions.entries()) {
    const field = `downmix.conversions[${index}]`;
    const base = { file: doc.file, conversion_index: index };

    if (!isRecord(raw)) {
      issues.error(ISSUE_IDS.PolicySchemaInvalid, "DMX.REG.030", `Conversion ${index} must be a mapping`, {
        ...base,
        field,
      });
      continue;
    }
    const entry = raw;

    const unknownLayouts = new Set<"source" | "target">();
    const layoutOf = (side: "source" | "target"): string | undefined => {
      const key = `${side}_layout_id` as const;
      const value = entry[key];
      if (typeof value !== "string" || value.length === 0) {
        issues.error(ISSUE_IDS.PolicySchemaInvalid, "DMX.REG.030", `Conversion ${index} missing ${key}`, {
          ...base,
          field: `${field}.${key}`,
        });
        return undefined;
      }
      if (!catalog.hasLayout(value)) {
        unknownLayouts.add(side);
        issues.error(
          ISSUE_IDS.LayoutUnknown,
          "DMX.REG.030",
          `Conversion ${index} ${key} references unknown layout: ${value}`,
          { ...base, field: `${field}.${key}`, layout_id: value }
        );
      }
      return value;
    };

    const sourceLayoutId = layoutOf("source");
    const targetLayoutId = layoutOf("target");

    let matrixId: string | undefined;
    if (typeof entry.matrix_id === "string" && entry.matrix_id.length > 0) {
      matrixId = entry.matrix_id;
    } else {
      issues.error(ISSUE_IDS.PolicySchemaInvalid, "DMX.REG.032", `Conversion ${index} missing matrix_id`, {
        ...base,
        field: `${field}.matrix_id`,
      });
    }

    let policyId: string | undefined;
    const declared = entry.policy_id;
    if (declared === undefined || declared === null) {
      policyId = sourceLayoutId !== undefined ? defaults.get(sourceLayoutId) : undefined;
      // An unknown source layout has no default; REG.030 already covers it.
      if (policyId === undefined && !unknownLayouts.has("source")) {
        issues.error(
          ISSUE_IDS.PolicyIdMismatch,
          "DMX.REG.031",
          `Conversion ${index} has no policy_id and no default policy for ${String(sourceLayoutId)}`,
          { ...base, field: `${field}.policy_id`, ...(matrixId ? { matrix_id: matrixId } : {}) }
        );
      }
    } else if (typeof declared === "string" && Object.hasOwn(doc.policies, declared)) {
      policyId = declared;
    } else {
      issues.error(
        ISSUE_IDS.PolicyIdMismatch,
        "DMX.REG.031",
        `Conversion ${index} references unregistered policy: ${String(declared)}`,
        {
          ...base,
          field: `${field}.policy_id`,
          actual: String(declared),
          ...(matrixId ? { matrix_id: matrixId } : {}),
        }
      );
    }

    if (sourceLayoutId === undefined || targetLayoutId === undefined || matrixId === undefined) {
      continue;
    }
    records.push({
      index,
      source_layout_id: sourceLayoutId,
      target_layout_id: targetLayoutId,
      ...(policyId !== undefined ? { policy_id: policyId } : {}),
      matrix_id: matrixId,
      unknownLayouts,
    });
  }

  return records;
}

/**
 * Check that each conversion's matrix exists in its policy's pack and
 * declares the same layouts. Conversions whose pack is unusable were
 * already reported by the pack loader and are skipped.
 */
export function validateConversionMatrices(
  registryFile: string,
  conversions: readonly ConversionRecord[],
  packs: ReadonlyMap<string, PolicyPack>,
  issues: IssueCollector
): void {
  for (const conversion of conversions) {
    if (conversion.policy_id === undefined) continue;
    const pack = packs.get(conversion.policy_id);
    if (!pack) continue;

    const evidence = {
      file: registryFile,
      conversion_index: conversion.index,
      policy_id: conversion.policy_id,
      matrix_id: conversion.matrix_id,
    };

    if (!pack.declared_matrix_ids.has(conversion.matrix_id)) {
      issues.error(
        ISSUE_IDS.MatrixIdMissing,
        "DMX.REG.032",
        `Policy ${conversion.policy_id} has no matrix ${conversion.matrix_id}`,
        { ...evidence, field: `downmix.conversions[${conversion.index}].matrix_id` }
      );
      continue;
    }

    const matrix = pack.matrices.get(conversion.matrix_id);
    if (!matrix) continue;

    for (const side of ["source", "target"] as const) {
      if (conversion.unknownLayouts.has(side)) continue;
      const expected = side === "source" ? conversion.source_layout_id : conversion.target_layout_id;
      const actual = side === "source" ? matrix.source_layout_id : matrix.target_layout_id;
      if (actual === undefined || actual === expected) continue;
      issues.error(
        ISSUE_IDS.LayoutSpeakerMismatch,
        "DMX.REG.033",
        `Conversion ${conversion.index} ${side} layout ${expected} does not match matrix ${conversion.matrix_id} (${actual})`,
        { ...evidence, field: `downmix.conversions[${conversion.index}].${side}_layout_id`, expected, actual }
      );
    }
  }
}

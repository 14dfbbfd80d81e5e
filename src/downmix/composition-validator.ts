/**
 * Composition path checks.
 *
 * A path is a finite, ordered array of steps. Each step resolves to one
 * matrix; neighbouring steps are compared by index
 * (`steps[i].target === steps[i + 1].source`) and the ends are compared with
 * the path's declared layouts.
 */

import type { Catalog } from "./catalog.js";
import type { IssueCollector } from "./issues.js";
import { isRecord, type RegistryDocument } from "./loader.js";
import { ISSUE_IDS, type CompositionPath, type CompositionStep, type Matrix, type PolicyPack } from "./types.js";

export interface CompositionPathRecord {
  index: number;
  source_layout_id: string;
  target_layout_id: string;
  policy_id?: string;
  /** `null` marks a malformed step; indices match the document. */
  steps: readonly (CompositionStep | null)[];
  unknownLayouts: ReadonlySet<"source" | "target">;
  /** A step or the path names an unregistered policy. */
  unregisteredPolicy: boolean;
}

export function toCompositionPath(record: CompositionPathRecord): CompositionPath | null {
  const steps: CompositionStep[] = [];
  for (const step of record.steps) {
    if (step === null) return null;
    steps.push(step);
  }
  return {
    index: record.index,
    source_layout_id: record.source_layout_id,
    target_layout_id: record.target_layout_id,
    ...(record.policy_id !== undefined ? { policy_id: record.policy_id } : {}),
    steps,
  };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Parse `composition_paths`. Absent paths yield an empty list and no issues.
 */
export function parseCompositionPaths(
  doc: RegistryDocument,
  catalog: Catalog,
  issues: IssueCollector
): CompositionPathRecord[] {
  const records: CompositionPathRecord[] = [];

  for (const [index, raw] of doc.compositionPaths.entries()) {
    const field = `downmix.composition_paths[${index}]`;
    const base = { file: doc.file, path_index: index };

    if (!isRecord(raw)) {
      issues.error(ISSUE_IDS.PolicySchemaInvalid, "DMX.REG.040", `Composition path ${index} must be a mapping`, {
        ...base,
        field,
      });
      continue;
    }
    const entry = raw;

    const unknownLayouts = new Set<"source" | "target">();
    const layoutOf = (side: "source" | "target"): string | undefined => {
      const key = `${side}_layout_id` as const;
      const value = optionalString(entry[key]);
      if (value === undefined) {
        issues.error(
          ISSUE_IDS.PolicySchemaInvalid,
          "DMX.REG.040",
          `Composition path ${index} missing ${key}`,
          { ...base, field: `${field}.${key}` }
        );
        return undefined;
      }
      if (!catalog.hasLayout(value)) {
        unknownLayouts.add(side);
        issues.error(
          ISSUE_IDS.LayoutUnknown,
          "DMX.REG.040",
          `Composition path ${index} ${key} references unknown layout: ${value}`,
          { ...base, field: `${field}.${key}`, layout_id: value }
        );
      }
      return value;
    };

    const sourceLayoutId = layoutOf("source");
    const targetLayoutId = layoutOf("target");

    let unregisteredPolicy = false;
    const checkPolicy = (value: unknown, at: string, stepIndex?: number): string | undefined => {
      if (value === undefined || value === null) return undefined;
      if (typeof value === "string" && Object.hasOwn(doc.policies, value)) return value;
      unregisteredPolicy = true;
      issues.error(
        ISSUE_IDS.PolicyIdMismatch,
        "DMX.REG.040",
        `Composition path ${index} references unregistered policy: ${String(value)}`,
        { ...base, field: at, actual: String(value), ...(stepIndex !== undefined ? { step_index: stepIndex } : {}) }
      );
      return undefined;
    };

    const policyId = checkPolicy(entry.policy_id, `${field}.policy_id`);

    const rawSteps = entry.steps;
    if (!Array.isArray(rawSteps) || rawSteps.length === 0) {
      issues.error(
        ISSUE_IDS.PolicySchemaInvalid,
        "DMX.REG.040",
        `Composition path ${index} missing or empty steps list`,
        { ...base, field: `${field}.steps` }
      );
      continue;
    }

    const steps: (CompositionStep | null)[] = rawSteps.map((rawStep: unknown, stepIndex) => {
      const stepField = `${field}.steps[${stepIndex}]`;
      const matrixId = isRecord(rawStep) ? optionalString(rawStep.matrix_id) : undefined;
      if (!isRecord(rawStep) || matrixId === undefined) {
        issues.error(
          ISSUE_IDS.PolicySchemaInvalid,
          "DMX.REG.040",
          `Composition path ${index} step ${stepIndex} must be a mapping with a matrix_id`,
          { ...base, step_index: stepIndex, field: stepField }
        );
        return null;
      }
      const stepPolicy = checkPolicy(rawStep.policy_id, `${stepField}.policy_id`, stepIndex);
      const stepSource = optionalString(rawStep.source_layout_id);
      const stepTarget = optionalString(rawStep.target_layout_id);
      return {
        matrix_id: matrixId,
        ...(stepPolicy !== undefined ? { policy_id: stepPolicy } : {}),
        ...(stepSource !== undefined ? { source_layout_id: stepSource } : {}),
        ...(stepTarget !== undefined ? { target_layout_id: stepTarget } : {}),
      };
    });

    if (sourceLayoutId === undefined || targetLayoutId === undefined) continue;
    records.push({
      index,
      source_layout_id: sourceLayoutId,
      target_layout_id: targetLayoutId,
      ...(policyId !== undefined ? { policy_id: policyId } : {}),
      steps,
      unknownLayouts,
      unregisteredPolicy,
    });
  }

  return records;
}

// ---------------------------------------------------------------------------
// Step resolution
// ---------------------------------------------------------------------------

export type StepLocation =
  | { status: "found"; policyId: string; matrix: Matrix }
  /** Declared by a pack but not a usable matrix; reported by the pack. */
  | { status: "unusable"; policyId: string }
  /** Not found, but the step's own pack is unusable; reported elsewhere. */
  | { status: "unavailable" }
  | { status: "missing"; policyId?: string };

/**
 * Find the matrix for a step: the step's policy, else the path's, else the
 * default for the path's source layout. When that pack lacks the matrix the
 * other packs are searched in policy-ID order.
 */
export function locateStepMatrix(
  step: CompositionStep,
  path: Pick<CompositionPath, "policy_id" | "source_layout_id">,
  packs: ReadonlyMap<string, PolicyPack>,
  defaults: ReadonlyMap<string, string>,
  registeredPolicies: ReadonlySet<string>
): StepLocation {
  const contextPolicy = step.policy_id ?? path.policy_id ?? defaults.get(path.source_layout_id);

  const lookIn = (policyId: string): StepLocation | undefined => {
    const pack = packs.get(policyId);
    if (!pack || !pack.declared_matrix_ids.has(step.matrix_id)) return undefined;
    const matrix = pack.matrices.get(step.matrix_id);
    return matrix ? { status: "found", policyId, matrix } : { status: "unusable", policyId };
  };

  if (contextPolicy !== undefined) {
    const hit = lookIn(contextPolicy);
    if (hit) return hit;
  }
  for (const policyId of [...packs.keys()].sort()) {
    if (policyId === contextPolicy) continue;
    const hit = lookIn(policyId);
    if (hit) return hit;
  }

  if (contextPolicy !== undefined && registeredPolicies.has(contextPolicy) && !packs.has(contextPolicy)) {
    return { status: "unavailable" };
  }
  return contextPolicy !== undefined ? { status: "missing", policyId: contextPolicy } : { status: "missing" };
}

// ---------------------------------------------------------------------------
// Chain checks
// ---------------------------------------------------------------------------

export function validateCompositionPaths(
  registryFile: string,
  paths: readonly CompositionPathRecord[],
  packs: ReadonlyMap<string, PolicyPack>,
  defaults: ReadonlyMap<string, string>,
  registeredPolicies: ReadonlySet<string>,
  issues: IssueCollector
): void {
  for (const path of paths) {
    const base = { file: registryFile, path_index: path.index };
    const field = `downmix.composition_paths[${path.index}]`;

    const resolved: (Matrix | undefined)[] = path.steps.map((step, stepIndex) => {
      if (step === null) return undefined;
      const location = locateStepMatrix(step, path, packs, defaults, registeredPolicies);
      if (location.status === "found") return location.matrix;
      if (location.status === "missing" && !path.unregisteredPolicy) {
        issues.error(
          ISSUE_IDS.MatrixIdMissing,
          "DMX.REG.040",
          `Composition path ${path.index} step ${stepIndex} matrix not found: ${step.matrix_id}`,
          {
            ...base,
            step_index: stepIndex,
            matrix_id: step.matrix_id,
            field: `${field}.steps[${stepIndex}].matrix_id`,
            ...(location.policyId !== undefined ? { policy_id: location.policyId } : {}),
          }
        );
      }
      return undefined;
    });

    // Step-declared layouts against the resolved matrix.
    path.steps.forEach((step, stepIndex) => {
      const matrix = resolved[stepIndex];
      if (step === null || matrix === undefined) return;
      for (const side of ["source", "target"] as const) {
        const declared = side === "source" ? step.source_layout_id : step.target_layout_id;
        const actual = side === "source" ? matrix.source_layout_id : matrix.target_layout_id;
        if (declared === undefined || actual === undefined || declared === actual) continue;
        issues.error(
          ISSUE_IDS.LayoutSpeakerMismatch,
          "DMX.REG.043",
          `Composition path ${path.index} step ${stepIndex} declares ${side} ${declared} but matrix ${matrix.matrix_id} uses ${actual}`,
          {
            ...base,
            step_index: stepIndex,
            matrix_id: matrix.matrix_id,
            field: `${field}.steps[${stepIndex}].${side}_layout_id`,
            expected: declared,
            actual,
          }
        );
      }
    });

    // Contiguity across each step boundary.
    for (let i = 0; i + 1 < resolved.length; i++) {
      const current = resolved[i];
      const next = resolved[i + 1];
      if (current === undefined || next === undefined) continue;
      const from = current.target_layout_id;
      const to = next.source_layout_id;
      if (from === undefined || to === undefined || from === to) continue;
      issues.error(
        ISSUE_IDS.LayoutSpeakerMismatch,
        "DMX.REG.041",
        `Composition path ${path.index} breaks between step ${i} (${current.matrix_id} -> ${from}) and step ${i + 1} (${next.matrix_id} <- ${to})`,
        { ...base, step_index: i, field: `${field}.steps[${i + 1}]`, expected: from, actual: to }
      );
    }

    // Endpoints.
    const first = resolved[0];
    if (
      first?.source_layout_id !== undefined &&
      !path.unknownLayouts.has("source") &&
      first.source_layout_id !== path.source_layout_id
    ) {
      issues.error(
        ISSUE_IDS.LayoutSpeakerMismatch,
        "DMX.REG.042",
        `Composition path ${path.index} starts at ${first.source_layout_id}, declared source is ${path.source_layout_id}`,
        {
          ...base,
          step_index: 0,
          field: `${field}.source_layout_id`,
          expected: path.source_layout_id,
          actual: first.source_layout_id,
        }
      );
    }
    const lastIndex = resolved.length - 1;
    const last = resolved[lastIndex];
    if (
      last?.target_layout_id !== undefined &&
      !path.unknownLayouts.has("target") &&
      last.target_layout_id !== path.target_layout_id
    ) {
      issues.error(
        ISSUE_IDS.LayoutSpeakerMismatch,
        "DMX.REG.042",
        `Composition path ${path.index} ends at ${last.target_layout_id}, declared target is ${path.target_layout_id}`,
        {
          ...base,
          step_index: lastIndex,
          field: `${field}.target_layout_id`,
          expected: path.target_layout_id,
          actual: last.target_layout_id,
        }
      );
    }
  }
}

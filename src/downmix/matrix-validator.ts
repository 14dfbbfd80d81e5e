/**
 * Matrix validation for one loaded policy pack.
 *
 * Checks declared layouts, coefficient shape, speaker IDs, the exact
 * target-channel set and source-channel membership, then hands every row to
 * the coefficient checker.
 */

import type { Catalog } from "./catalog.js";
import { checkCoefficientRow } from "./coefficients.js";
import type { IssueCollector } from "./issues.js";
import { isRecord, type PolicyPackDocument } from "./loader.js";
import {
  ISSUE_IDS,
  type CoefficientMap,
  type Layout,
  type Matrix,
  type PolicyPack,
} from "./types.js";

interface MatrixContext {
  catalog: Catalog;
  issues: IssueCollector;
  file: string;
  policyId: string;
}

function checkLayoutField(
  raw: Record<string, unknown>,
  field: "source_layout_id" | "target_layout_id",
  matrixId: string,
  ctx: MatrixContext
): { id?: string; layout?: Layout } {
  const value = raw[field];
  const evidence = {
    file: ctx.file,
    policy_id: ctx.policyId,
    matrix_id: matrixId,
    field: `downmix_policy_pack.matrices.${matrixId}.${field}`,
  };

  if (typeof value !== "string" || value.length === 0) {
    ctx.issues.error(
      ISSUE_IDS.PolicySchemaInvalid,
      "DMX.PACK.010",
      `Matrix ${matrixId} missing ${field}`,
      evidence
    );
    return {};
  }

  const layout = ctx.catalog.layout(value);
  if (!layout) {
    ctx.issues.error(
      ISSUE_IDS.LayoutUnknown,
      "DMX.PACK.010",
      `Matrix ${matrixId} ${field} references unknown layout: ${value}`,
      { ...evidence, layout_id: value }
    );
    return { id: value };
  }
  return { id: value, layout };
}

function validateMatrix(matrixId: string, raw: unknown, ctx: MatrixContext): Matrix | null {
  const base = { file: ctx.file, policy_id: ctx.policyId, matrix_id: matrixId };

  if (!isRecord(raw)) {
    ctx.issues.error(
      ISSUE_IDS.PolicySchemaInvalid,
      "DMX.PACK.002",
      `Matrix ${matrixId} must be a mapping`,
      { ...base, field: `downmix_policy_pack.matrices.${matrixId}` }
    );
    return null;
  }

  const source = checkLayoutField(raw, "source_layout_id", matrixId, ctx);
  const target = checkLayoutField(raw, "target_layout_id", matrixId, ctx);

  const matrix: Matrix = {
    matrix_id: matrixId,
    ...(source.id !== undefined ? { source_layout_id: source.id } : {}),
    ...(target.id !== undefined ? { target_layout_id: target.id } : {}),
    ...(source.layout ? { source_layout: source.layout } : {}),
    ...(target.layout ? { target_layout: target.layout } : {}),
    coefficients: {},
  };

  const rawCoefficients = raw.coefficients;
  if (!isRecord(rawCoefficients)) {
    ctx.issues.error(
      ISSUE_IDS.PolicySchemaInvalid,
      "DMX.PACK.011",
      `Matrix ${matrixId} coefficients must be a mapping of target speaker to source gains`,
      { ...base, field: `downmix_policy_pack.matrices.${matrixId}.coefficients` }
    );
    return matrix;
  }

  const coefficients: Record<string, Readonly<Record<string, unknown>>> = {};
  const sourceChannels = new Set<string>(source.layout?.channel_order ?? []);
  const targetChannels = new Set<string>(target.layout?.channel_order ?? []);
  const targetKeys = Object.keys(rawCoefficients).sort();

  for (const targetSpeaker of targetKeys) {
    const rowEvidence = { ...base, target_speaker: targetSpeaker };
    const targetKnown = ctx.catalog.hasSpeaker(targetSpeaker);

    if (!targetKnown) {
      ctx.issues.error(
        ISSUE_IDS.SpeakerUnknown,
        "DMX.PACK.012",
        `Matrix ${matrixId} target speaker is not a known speaker: ${targetSpeaker}`,
        rowEvidence
      );
    } else if (target.layout && !targetChannels.has(targetSpeaker)) {
      ctx.issues.error(
        ISSUE_IDS.LayoutSpeakerMismatch,
        "DMX.PACK.013",
        `Matrix ${matrixId} target speaker ${targetSpeaker} is not a channel of ${target.layout.layout_id}`,
        { ...rowEvidence, layout_id: target.layout.layout_id }
      );
    }

    const row = rawCoefficients[targetSpeaker];
    if (!isRecord(row)) {
      ctx.issues.error(
        ISSUE_IDS.PolicySchemaInvalid,
        "DMX.PACK.011",
        `Matrix ${matrixId} coefficients for ${targetSpeaker} must be a mapping`,
        { ...rowEvidence, field: `downmix_policy_pack.matrices.${matrixId}.coefficients.${targetSpeaker}` }
      );
      continue;
    }
    coefficients[targetSpeaker] = row;

    for (const sourceSpeaker of Object.keys(row).sort()) {
      const cellEvidence = { ...rowEvidence, source_speaker: sourceSpeaker };
      if (!ctx.catalog.hasSpeaker(sourceSpeaker)) {
        ctx.issues.error(
          ISSUE_IDS.SpeakerUnknown,
          "DMX.PACK.012",
          `Matrix ${matrixId} source speaker is not a known speaker: ${sourceSpeaker}`,
          cellEvidence
        );
      } else if (source.layout && !sourceChannels.has(sourceSpeaker)) {
        ctx.issues.error(
          ISSUE_IDS.LayoutSpeakerMismatch,
          "DMX.PACK.014",
          `Matrix ${matrixId} source speaker ${sourceSpeaker} is not a channel of ${source.layout.layout_id}`,
          { ...cellEvidence, layout_id: source.layout.layout_id }
        );
      }
    }

    checkCoefficientRow(row, rowEvidence, ctx.issues);
  }

  // A missing target channel renders as silence.
  if (target.layout) {
    const present = new Set(targetKeys);
    for (const channel of target.layout.channel_order) {
      if (present.has(channel)) continue;
      ctx.issues.error(
        ISSUE_IDS.LayoutSpeakerMismatch,
        "DMX.PACK.013",
        `Matrix ${matrixId} has no coefficients for ${channel} of ${target.layout.layout_id}`,
        { ...base, target_speaker: channel, layout_id: target.layout.layout_id }
      );
    }
  }

  const frozen: CoefficientMap = Object.freeze(coefficients);
  return { ...matrix, coefficients: frozen };
}

/**
 * Validate every matrix of a loaded pack. Returns `null` when the pack has
 * no usable `matrices` mapping.
 */
export function validatePackMatrices(
  doc: PolicyPackDocument,
  catalog: Catalog,
  issues: IssueCollector
): PolicyPack | null {
  if (doc.matrices === null) return null;

  const ctx: MatrixContext = { catalog, issues, file: doc.file, policyId: doc.policyKey };
  const matrices = new Map<string, Matrix>();
  for (const [matrixId, raw] of doc.matrices) {
    const matrix = validateMatrix(matrixId, raw, ctx);
    if (matrix) matrices.set(matrixId, matrix);
  }

  return {
    file: doc.file,
    policy_id: doc.policyKey,
    ...(doc.packVersion !== undefined ? { pack_version: doc.packVersion } : {}),
    declared_matrix_ids: new Set(doc.matrices.keys()),
    matrices,
  };
}

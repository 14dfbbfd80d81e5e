/**
 * Coefficient sanity rules for one target channel of a downmix matrix.
 *
 * Gains are linear, not decibels. Limits are inclusive: a value equal to a
 * limit passes.
 */

import type { IssueCollector } from "./issues.js";
import { ISSUE_IDS } from "./types.js";

/** Beyond this magnitude a coefficient is not a usable gain. */
export const COEFF_HARD_LIMIT = 4.0;
export const COEFF_SOFT_LIMIT = 2.0;
export const SUM_ABS_WARN_LIMIT = 2.5;
export const SUM_ABS_ERROR_LIMIT = 4.0;

export interface CoefficientRowContext {
  file: string;
  policy_id: string;
  matrix_id: string;
  target_speaker: string;
}

function evidenceValue(value: unknown): number | string | boolean | null {
  if (typeof value === "number" || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (value === null || value === undefined) return null;
  return Array.isArray(value) ? "[list]" : "[mapping]";
}

/**
 * Check every gain in one target row, then the row's sum of magnitudes.
 *
 * Returns the sum of absolute values over the finite numeric gains.
 */
export function checkCoefficientRow(
  row: Readonly<Record<string, unknown>>,
  ctx: CoefficientRowContext,
  issues: IssueCollector
): number {
  let sumAbs = 0;

  for (const sourceSpeaker of Object.keys(row).sort()) {
    const value = row[sourceSpeaker];
    const evidence = { ...ctx, source_speaker: sourceSpeaker };

    if (typeof value !== "number" || !Number.isFinite(value)) {
      issues.error(
        ISSUE_IDS.CoefficientInvalid,
        "DMX.COEFF.001",
        `Coefficient ${ctx.target_speaker} <- ${sourceSpeaker} must be a finite number`,
        { ...evidence, value: evidenceValue(value) }
      );
      continue;
    }

    const magnitude = Math.abs(value);
    sumAbs += magnitude;

    if (magnitude > COEFF_HARD_LIMIT) {
      issues.error(
        ISSUE_IDS.CoefficientInvalid,
        "DMX.COEFF.002",
        `Coefficient ${ctx.target_speaker} <- ${sourceSpeaker} exceeds hard limit ${COEFF_HARD_LIMIT}`,
        { ...evidence, value, limit: COEFF_HARD_LIMIT }
      );
    } else if (magnitude > COEFF_SOFT_LIMIT) {
      issues.warn(
        ISSUE_IDS.CoefficientHigh,
        "DMX.COEFF.003",
        `Coefficient ${ctx.target_speaker} <- ${sourceSpeaker} exceeds ${COEFF_SOFT_LIMIT}`,
        { ...evidence, value, limit: COEFF_SOFT_LIMIT }
      );
    }
  }

  // One finding per channel: the error replaces the warning.
  if (sumAbs > SUM_ABS_ERROR_LIMIT) {
    issues.error(
      ISSUE_IDS.CoefficientInvalid,
      "DMX.COEFF.004",
      `Unexpected level on ${ctx.target_speaker}: sum of |coefficients| ${sumAbs} exceeds ${SUM_ABS_ERROR_LIMIT}`,
      { ...ctx, sum_abs: sumAbs, limit: SUM_ABS_ERROR_LIMIT }
    );
  } else if (sumAbs > SUM_ABS_WARN_LIMIT) {
    issues.warn(
      ISSUE_IDS.CoefficientHigh,
      "DMX.COEFF.004",
      `Unexpected level on ${ctx.target_speaker}: sum of |coefficients| ${sumAbs} exceeds ${SUM_ABS_WARN_LIMIT}`,
      { ...ctx, sum_abs: sumAbs, limit: SUM_ABS_WARN_LIMIT }
    );
  }

  return sumAbs;
}

/**
 * Conversion resolution over a validated registry.
 *
 * Produces dense coefficient matrices in layout channel order, composing
 * multi-step paths when needed. Only a run without errors can be resolved.
 */

import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { locateStepMatrix } from "./composition-validator.js";
import type { CompositionStep, Matrix, PolicyEntry, PolicyPack, Registry } from "./types.js";
import type { ValidationRun } from "./validator.js";

export type ResolveErrorCode =
  | "REGISTRY_INVALID"
  | "POLICY_UNKNOWN"
  | "NO_DEFAULT_POLICY"
  | "NO_CONVERSION"
  | "MATRIX_UNKNOWN"
  | "LAYOUT_MISMATCH"
  | "MATRIX_SHAPE";

export class DownmixResolveError extends Error {
  readonly name = "DownmixResolveError";

  constructor(
    message: string,
    public readonly code: ResolveErrorCode
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DownmixResolveError);
    }
  }
}

/** Dense matrix: `coeffs[t][s]` is the gain from source channel s to target channel t. */
export interface MatrixBody {
  source_layout_id: string;
  target_layout_id: string;
  source_speakers: string[];
  target_speakers: string[];
  coeffs: number[][];
}

export interface DenseMatrix extends MatrixBody {
  matrix_id: string;
  /** Matrix IDs of the composed steps, in order. */
  steps?: string[];
}

export type Resolution =
  | { source_layout_id: string; target_layout_id: string; policy_id?: string; matrix_id: string }
  | { source_layout_id: string; target_layout_id: string; policy_id?: string; steps: CompositionStep[] };

// Products smaller than this are treated as exact zeros.
const COMPOSE_EPSILON = 1e-12;

/**
 * Compose two dense matrices: the result applies `a` then `b`.
 */
export function composeMatrices(a: MatrixBody, b: MatrixBody): MatrixBody {
  const mid = a.target_speakers;
  if (mid.length !== b.source_speakers.length || mid.some((s, i) => s !== b.source_speakers[i])) {
    throw new DownmixResolveError("Matrix composition requires matching mid speaker order", "LAYOUT_MISMATCH");
  }
  if (a.source_speakers.length === 0 || b.target_speakers.length === 0 || mid.length === 0) {
    throw new DownmixResolveError("Matrix composition requires non-empty speaker lists", "MATRIX_SHAPE");
  }

  const coeffs = b.target_speakers.map((_, t) =>
    a.source_speakers.map((_, s) => {
      let total = 0;
      for (let m = 0; m < mid.length; m++) {
        total += (b.coeffs[t]?.[m] ?? 0) * (a.coeffs[m]?.[s] ?? 0);
      }
      return Math.abs(total) < COMPOSE_EPSILON ? 0 : total;
    })
  );

  return {
    source_layout_id: a.source_layout_id,
    target_layout_id: b.target_layout_id,
    source_speakers: [...a.source_speakers],
    target_speakers: [...b.target_speakers],
    coeffs,
  };
}

/**
 * Render a dense matrix as CSV: a `target_speaker,<sources...>` header and
 * one row per target speaker.
 */
export function formatMatrixCsv(matrix: MatrixBody, decimals = 6): string {
  if (matrix.coeffs.length !== matrix.target_speakers.length) {
    throw new DownmixResolveError("Matrix coeff row count does not match target speakers", "MATRIX_SHAPE");
  }
  for (const row of matrix.coeffs) {
    if (row.length !== matrix.source_speakers.length) {
      throw new DownmixResolveError("Matrix coeff row width does not match source speakers", "MATRIX_SHAPE");
    }
  }
  const lines = [["target_speaker", ...matrix.source_speakers].join(",")];
  matrix.target_speakers.forEach((target, t) => {
    const row = matrix.coeffs[t] ?? [];
    lines.push([target, ...row.map((v) => v.toFixed(decimals))].join(","));
  });
  return lines.join("\n") + "\n";
}

function compareStr(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class DownmixResolver {
  private constructor(
    private readonly registry: Registry,
    private readonly packs: ReadonlyMap<string, PolicyPack>
  ) {}

  /**
   * Wrap a finished validation run. Throws when the registry did not load or
   * the run reported errors.
   */
  static fromRun(run: ValidationRun): DownmixResolver {
    if (run.registry === null || !run.report.ok) {
      throw new DownmixResolveError(
        `Registry has ${run.report.issue_counts.error} validation error(s): ${run.report.registry_file}`,
        "REGISTRY_INVALID"
      );
    }
    return new DownmixResolver(run.registry, run.packs);
  }

  /** Policy IDs in sorted order. */
  listPolicyIds(): string[] {
    return [...this.registry.policies.keys()].sort();
  }

  getPolicy(policyId: string): PolicyEntry {
    const normalized = policyId.trim();
    if (!normalized) {
      throw new DownmixResolveError("policy_id must be a non-empty string.", "POLICY_UNKNOWN");
    }
    const policy = this.registry.policies.get(normalized);
    if (policy) {
      return {
        ...policy,
        supports_source_layouts: [...policy.supports_source_layouts],
        supports_target_layouts: [...policy.supports_target_layouts],
      };
    }
    const known = this.listPolicyIds();
    throw new DownmixResolveError(
      known.length > 0
        ? `Unknown policy_id: ${normalized}. Known policy_ids: ${known.join(", ")}`
        : `Unknown policy_id: ${normalized}. No policies are available.`,
      "POLICY_UNKNOWN"
    );
  }

  defaultPolicyForSource(sourceLayoutId: string): string | undefined {
    return this.registry.default_policy_by_source_layout.get(sourceLayoutId);
  }

  /**
   * Pick the conversion or composition path for a layout pair. Ties break by
   * (policy_id, matrix_id) for direct conversions and by sorted step matrix
   * IDs for paths.
   */
  resolve(policyId: string | undefined, fromLayoutId: string, toLayoutId: string): Resolution {
    const effective = policyId ?? this.defaultPolicyForSource(fromLayoutId);

    const direct = this.registry.conversions
      .filter(
        (c) =>
          c.source_layout_id === fromLayoutId &&
          c.target_layout_id === toLayoutId &&
          (effective === undefined || c.policy_id === effective)
      )
      .sort((a, b) => compareStr(a.policy_id ?? "", b.policy_id ?? "") || compareStr(a.matrix_id, b.matrix_id));
    const winner = direct[0];
    if (winner) {
      const policy = winner.policy_id ?? effective;
      return {
        source_layout_id: fromLayoutId,
        target_layout_id: toLayoutId,
        ...(policy !== undefined ? { policy_id: policy } : {}),
        matrix_id: winner.matrix_id,
      };
    }

    const stepKey = (steps: readonly CompositionStep[]): string =>
      JSON.stringify(steps.map((s) => s.matrix_id).sort());
    const paths = this.registry.composition_paths
      .filter((p) => p.source_layout_id === fromLayoutId && p.target_layout_id === toLayoutId)
      .sort((a, b) => compareStr(stepKey(a.steps), stepKey(b.steps)));
    const path = paths[0];
    if (path) {
      return {
        source_layout_id: fromLayoutId,
        target_layout_id: toLayoutId,
        ...(effective !== undefined ? { policy_id: effective } : {}),
        steps: path.steps.map((s) => ({ ...s })),
      };
    }

    const knownSources = new Set<string>();
    for (const c of this.registry.conversions) knownSources.add(c.source_layout_id);
    for (const p of this.registry.composition_paths) knownSources.add(p.source_layout_id);
    throw new DownmixResolveError(
      `No conversion found: ${fromLayoutId} -> ${toLayoutId}. Known source layouts: ${[...knownSources].sort().join(", ")}`,
      "NO_CONVERSION"
    );
  }

  /**
   * Dense matrix for one matrix of one policy, rows and columns in layout
   * channel order. Gains the pack leaves out are 0.
   */
  buildMatrix(policyId: string, matrixId: string): DenseMatrix {
    const pack = this.packs.get(policyId);
    if (!pack) {
      throw new DownmixResolveError(`Unknown policy_id: ${policyId}`, "POLICY_UNKNOWN");
    }
    const matrix = pack.matrices.get(matrixId);
    if (!matrix) {
      throw new DownmixResolveError(`Matrix not found: ${matrixId}`, "MATRIX_UNKNOWN");
    }
    return densify(matrix);
  }

  /**
   * Resolve a layout pair to a dense matrix. A direct conversion whose
   * matrix ID ends in `.COMPOSED` defers to a matching composition path.
   */
  resolveMatrix(fromLayoutId: string, toLayoutId: string, policyId?: string): DenseMatrix {
    const policy = policyId ?? this.defaultPolicyForSource(fromLayoutId);
    if (policy === undefined) {
      throw new DownmixResolveError(`No default policy for source layout ${fromLayoutId}`, "NO_DEFAULT_POLICY");
    }

    const direct = this.registry.conversions.find(
      (c) =>
        c.source_layout_id === fromLayoutId &&
        c.target_layout_id === toLayoutId &&
        (c.policy_id === undefined || c.policy_id === policy)
    );
    const path = this.registry.composition_paths.find(
      (p) => p.source_layout_id === fromLayoutId && p.target_layout_id === toLayoutId
    );
    const useComposition = path !== undefined && direct !== undefined && direct.matrix_id.endsWith(".COMPOSED");

    let result: DenseMatrix;
    if (direct && !useComposition) {
      result = this.buildMatrix(direct.policy_id ?? policy, direct.matrix_id);
    } else if (path) {
      const context = { policy_id: path.policy_id ?? policy, source_layout_id: path.source_layout_id };
      const registered = new Set(this.registry.policies.keys());
      const bodies = path.steps.map((step) => {
        const location = locateStepMatrix(
          step,
          context,
          this.packs,
          this.registry.default_policy_by_source_layout,
          registered
        );
        if (location.status !== "found") {
          throw new DownmixResolveError(`Matrix not found for step: ${step.matrix_id}`, "MATRIX_UNKNOWN");
        }
        const dense = densify(location.matrix);
        if (step.source_layout_id !== undefined && step.source_layout_id !== dense.source_layout_id) {
          throw new DownmixResolveError(`Step ${step.matrix_id} source layout mismatch`, "LAYOUT_MISMATCH");
        }
        if (step.target_layout_id !== undefined && step.target_layout_id !== dense.target_layout_id) {
          throw new DownmixResolveError(`Step ${step.matrix_id} target layout mismatch`, "LAYOUT_MISMATCH");
        }
        return dense;
      });

      let composed: MatrixBody | undefined;
      for (const body of bodies) {
        composed = composed === undefined ? body : composeMatrices(composed, body);
      }
      if (composed === undefined) {
        throw new DownmixResolveError(`Composition path for ${fromLayoutId} -> ${toLayoutId} has no steps`, "MATRIX_SHAPE");
      }
      result = {
        matrix_id: `DMX.COMPOSED.${fromLayoutId}_TO_${toLayoutId}`,
        source_layout_id: fromLayoutId,
        target_layout_id: toLayoutId,
        source_speakers: composed.source_speakers,
        target_speakers: composed.target_speakers,
        coeffs: composed.coeffs,
        steps: bodies.map((b) => b.matrix_id),
      };
    } else {
      throw new DownmixResolveError(
        `No conversion or composition path for ${fromLayoutId} -> ${toLayoutId}`,
        "NO_CONVERSION"
      );
    }

    emit(TelemetryEvents.MatrixResolved, {
      matrix_id: result.matrix_id,
      source_layout_id: fromLayoutId,
      target_layout_id: toLayoutId,
      policy_id: policy,
      steps: result.steps?.length ?? 1,
    });
    return result;
  }
}

function densify(matrix: Matrix): DenseMatrix {
  const source = matrix.source_layout;
  const target = matrix.target_layout;
  if (!source || !target) {
    throw new DownmixResolveError(`Matrix ${matrix.matrix_id} missing source/target layout IDs`, "MATRIX_SHAPE");
  }
  const coeffs = target.channel_order.map((targetSpeaker) => {
    const row = matrix.coefficients[targetSpeaker] ?? {};
    return source.channel_order.map((sourceSpeaker) => {
      const value = row[sourceSpeaker];
      return typeof value === "number" ? value : 0;
    });
  });
  return {
    matrix_id: matrix.matrix_id,
    source_layout_id: source.layout_id,
    target_layout_id: target.layout_id,
    source_speakers: [...source.channel_order],
    target_speakers: [...target.channel_order],
    coeffs,
  };
}

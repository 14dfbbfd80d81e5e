/**
 * Downmix policy model: reference data, registry documents, issues.
 *
 * Field names on the document-facing types follow the YAML keys so that a
 * report serializes to the same vocabulary the registry is written in.
 */

// ---------------------------------------------------------------------------
// Canonical IDs
// ---------------------------------------------------------------------------

declare const brand: unique symbol;

type Brand<T, B extends string> = T & { readonly [brand]: B };

/** Layout ID known to the catalog. Only `Catalog.layout()` produces one. */
export type LayoutId = Brand<string, "LayoutId">;

/** Speaker ID known to the catalog. Only `Catalog.speaker()` produces one. */
export type SpeakerId = Brand<string, "SpeakerId">;

/** Policy ID carrying the `POLICY.DOWNMIX.` prefix. */
export type PolicyId = Brand<string, "PolicyId">;

export const POLICY_ID_PREFIX = "POLICY.DOWNMIX.";

export function isPolicyId(value: unknown): value is PolicyId {
  return typeof value === "string" && value.startsWith(POLICY_ID_PREFIX);
}

// ---------------------------------------------------------------------------
// Severity
// ---------------------------------------------------------------------------

export const SEVERITIES = ["warn", "error"] as const;

export type Severity = (typeof SEVERITIES)[number];

/** Total order: warn < error. */
export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

export function maxSeverity(a: Severity | null, b: Severity): Severity {
  if (a === null) return b;
  return severityRank(b) > severityRank(a) ? b : a;
}

// ---------------------------------------------------------------------------
// Issue codes and rules
// ---------------------------------------------------------------------------

export const ISSUE_IDS = {
  PolicyParseError: "ISSUE.VALIDATION.POLICY_PARSE_ERROR",
  PolicySchemaInvalid: "ISSUE.VALIDATION.POLICY_SCHEMA_INVALID",
  PolicyFileMissing: "ISSUE.VALIDATION.POLICY_FILE_MISSING",
  PolicyIdMismatch: "ISSUE.VALIDATION.DOWNMIX_POLICY_ID_MISMATCH",
  LayoutUnknown: "ISSUE.VALIDATION.DOWNMIX_LAYOUT_UNKNOWN",
  SpeakerUnknown: "ISSUE.VALIDATION.DOWNMIX_SPEAKER_UNKNOWN",
  MatrixIdMissing: "ISSUE.VALIDATION.DOWNMIX_MATRIX_ID_MISSING",
  LayoutSpeakerMismatch: "ISSUE.VALIDATION.DOWNMIX_LAYOUT_SPEAKER_MISMATCH",
  CoefficientInvalid: "ISSUE.VALIDATION.DOWNMIX_COEFFICIENT_INVALID",
  CoefficientHigh: "ISSUE.VALIDATION.DOWNMIX_COEFFICIENT_HIGH",
} as const;

export type IssueId = (typeof ISSUE_IDS)[keyof typeof ISSUE_IDS];

export const KNOWN_ISSUE_IDS: ReadonlySet<string> = new Set(Object.values(ISSUE_IDS));

export function isIssueId(value: unknown): value is IssueId {
  return typeof value === "string" && KNOWN_ISSUE_IDS.has(value);
}

export type RuleId =
  | "DMX.REG.001"
  | "DMX.REG.002"
  | "DMX.REG.010"
  | "DMX.REG.011"
  | "DMX.REG.013"
  | "DMX.REG.014"
  | "DMX.REG.020"
  | "DMX.REG.030"
  | "DMX.REG.031"
  | "DMX.REG.032"
  | "DMX.REG.033"
  | "DMX.REG.040"
  | "DMX.REG.041"
  | "DMX.REG.042"
  | "DMX.REG.043"
  | "DMX.PACK.001"
  | "DMX.PACK.002"
  | "DMX.PACK.010"
  | "DMX.PACK.011"
  | "DMX.PACK.012"
  | "DMX.PACK.013"
  | "DMX.PACK.014"
  | "DMX.COEFF.001"
  | "DMX.COEFF.002"
  | "DMX.COEFF.003"
  | "DMX.COEFF.004";

/**
 * Structured context of a finding. `file` is always present; the other keys
 * appear where they apply.
 */
export interface IssueEvidence {
  file: string;
  field?: string;
  policy_id?: string;
  matrix_id?: string;
  layout_id?: string;
  expected?: string;
  actual?: string;
  target_speaker?: string;
  source_speaker?: string;
  value?: number | string | boolean | null;
  limit?: number;
  sum_abs?: number;
  conversion_index?: number;
  path_index?: number;
  step_index?: number;
  details?: string[];
}

export interface Issue {
  issue_id: IssueId;
  severity: Severity;
  rule_id: RuleId;
  message: string;
  evidence: IssueEvidence;
}

export interface IssueCounts {
  error: number;
  warn: number;
}

export interface ValidationReport {
  registry_file: string;
  ok: boolean;
  issues: Issue[];
  issue_counts: IssueCounts;
  max_severity: Severity | null;
}

// ---------------------------------------------------------------------------
// Reference data
// ---------------------------------------------------------------------------

export interface Layout {
  layout_id: LayoutId;
  channel_order: readonly SpeakerId[];
}

export interface Speaker {
  speaker_id: SpeakerId;
  azimuth_deg?: number;
  elevation_deg?: number;
}

// ---------------------------------------------------------------------------
// Registry and packs
// ---------------------------------------------------------------------------

/** Coefficient rows keyed by target speaker, then by source speaker. */
export type CoefficientMap = Readonly<Record<string, Readonly<Record<string, unknown>>>>;

export interface Matrix {
  matrix_id: string;
  /** Raw declared IDs; `undefined` when absent or not a string. */
  source_layout_id?: string;
  target_layout_id?: string;
  /** Resolved only when the catalog knows the layout. */
  source_layout?: Layout;
  target_layout?: Layout;
  coefficients: CoefficientMap;
}

export interface PolicyPack {
  file: string;
  /** Registry key the pack was loaded under. */
  policy_id: string;
  pack_version?: string;
  /** Every key under `matrices`, usable or not. */
  declared_matrix_ids: ReadonlySet<string>;
  /** Matrices that are mappings, sorted by matrix ID. */
  matrices: ReadonlyMap<string, Matrix>;
}

export interface PolicyEntry {
  policy_id: string;
  /** Absolute path, resolved against the registry's directory. */
  file?: string;
  label?: string;
  supports_source_layouts: readonly string[];
  supports_target_layouts: readonly string[];
}

export interface Conversion {
  index: number;
  source_layout_id: string;
  target_layout_id: string;
  /** Declared policy, else the default for the source layout. */
  policy_id?: string;
  matrix_id: string;
}

export interface CompositionStep {
  matrix_id: string;
  policy_id?: string;
  source_layout_id?: string;
  target_layout_id?: string;
}

export interface CompositionPath {
  index: number;
  source_layout_id: string;
  target_layout_id: string;
  policy_id?: string;
  steps: readonly CompositionStep[];
}

/** Parsed root registry. Built once per run and never mutated. */
export interface Registry {
  file: string;
  dir: string;
  meta: Readonly<Record<string, unknown>>;
  policies: ReadonlyMap<string, PolicyEntry>;
  default_policy_by_source_layout: ReadonlyMap<string, string>;
  conversions: readonly Conversion[];
  composition_paths: readonly CompositionPath[];
}

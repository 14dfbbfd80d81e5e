/**
 * Issue collection and deterministic ordering.
 *
 * Final order is (rule_id, file, matrix_id, target_speaker, source_speaker),
 * then issue_id, message and serialized evidence, compared by code unit.
 * Collection order never shows through.
 */

import {
  maxSeverity,
  type Issue,
  type IssueCounts,
  type IssueEvidence,
  type IssueId,
  type RuleId,
  type Severity,
  type ValidationReport,
} from "./types.js";

function cmpStr(a: string, b: string): number {
  // Locale-independent deterministic string compare (code-unit).
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// Absent keys sort after present ones.
const ABSENT = "\uffff";

export function compareIssues(a: Issue, b: Issue): number {
  return (
    cmpStr(a.rule_id, b.rule_id) ||
    cmpStr(a.evidence.file, b.evidence.file) ||
    cmpStr(a.evidence.matrix_id ?? ABSENT, b.evidence.matrix_id ?? ABSENT) ||
    cmpStr(a.evidence.target_speaker ?? ABSENT, b.evidence.target_speaker ?? ABSENT) ||
    cmpStr(a.evidence.source_speaker ?? ABSENT, b.evidence.source_speaker ?? ABSENT) ||
    cmpStr(a.issue_id, b.issue_id) ||
    cmpStr(a.message, b.message) ||
    cmpStr(JSON.stringify(a.evidence), JSON.stringify(b.evidence))
  );
}

export function sortIssues(issues: readonly Issue[]): Issue[] {
  return [...issues].sort(compareIssues);
}

export function countIssues(issues: readonly Issue[]): IssueCounts {
  const counts: IssueCounts = { error: 0, warn: 0 };
  for (const issue of issues) counts[issue.severity] += 1;
  return counts;
}

/**
 * Accumulates findings for one run. Issues are frozen on entry.
 */
export class IssueCollector {
  private readonly issues: Issue[] = [];

  add(
    issueId: IssueId,
    severity: Severity,
    ruleId: RuleId,
    message: string,
    evidence: IssueEvidence
  ): void {
    this.issues.push(
      Object.freeze({
        issue_id: issueId,
        severity,
        rule_id: ruleId,
        message,
        evidence: Object.freeze({ ...evidence }),
      })
    );
  }

  error(issueId: IssueId, ruleId: RuleId, message: string, evidence: IssueEvidence): void {
    this.add(issueId, "error", ruleId, message, evidence);
  }

  warn(issueId: IssueId, ruleId: RuleId, message: string, evidence: IssueEvidence): void {
    this.add(issueId, "warn", ruleId, message, evidence);
  }

  merge(other: IssueCollector): void {
    this.issues.push(...other.issues);
  }

  get size(): number {
    return this.issues.length;
  }

  hasErrors(): boolean {
    return this.issues.some((i) => i.severity === "error");
  }

  sorted(): Issue[] {
    return sortIssues(this.issues);
  }

  toReport(registryFile: string): ValidationReport {
    const issues = this.sorted();
    const issueCounts = countIssues(issues);
    return {
      registry_file: registryFile,
      ok: issueCounts.error === 0,
      issues,
      issue_counts: issueCounts,
      max_severity: issues.reduce<Severity | null>((acc, i) => maxSeverity(acc, i.severity), null),
    };
  }
}

/**
 * Lint-style exit code: 0 = clean, 1 = errors, 2 = warnings only.
 */
export function exitCodeFor(report: ValidationReport): 0 | 1 | 2 {
  if (report.issue_counts.error > 0) return 1;
  if (report.issue_counts.warn > 0) return 2;
  return 0;
}

import type {
  SubjectIdIssue,
  SubjectIdIssueKind,
  ValidationFinding,
} from './ValidationFinding';

export type ValidationStatus = 'Failed' | 'Warning' | 'Passed';

export type HeaderDiff = {
  /** Template columns absent from the file, in template order. */
  missing: readonly string[];
  /** File headers the template does not know, in file order. */
  extra: readonly string[];
  /** Headers present in both, in template order. */
  matched: readonly string[];
};

/**
 * Outcome of one validation run. Built once, deeply frozen, never mutated.
 */
export type ValidationResult = {
  templateId: string;
  templateVersion: string;
  totalRows: number;
  headerDiff: HeaderDiff;
  errors: readonly ValidationFinding[];
  warnings: readonly ValidationFinding[];
  subjectIdIssues: readonly SubjectIdIssue[];
  status: ValidationStatus;
};

export type ResultSummary = {
  totalRows: number;
  errorCount: number;
  warningCount: number;
  subjectIdIssueCount: number;
  subjectIdIssuesByKind: Record<SubjectIdIssueKind, number>;
  /** Missing plus extra headers. */
  headerIssueCount: number;
};

export const deriveStatus = (
  errors: readonly ValidationFinding[],
  warnings: readonly ValidationFinding[],
): ValidationStatus => {
  if (errors.length > 0) return 'Failed';
  if (warnings.length > 0) return 'Warning';
  return 'Passed';
};

export function summarizeResult(result: ValidationResult): ResultSummary {
  const subjectIdIssuesByKind: Record<SubjectIdIssueKind, number> = {
    unknown: 0,
    'full-name': 0,
    invalid: 0,
  };
  for (const issue of result.subjectIdIssues) {
    subjectIdIssuesByKind[issue.kind] += 1;
  }

  return {
    totalRows: result.totalRows,
    errorCount: result.errors.length,
    warningCount: result.warnings.length,
    subjectIdIssueCount: result.subjectIdIssues.length,
    subjectIdIssuesByKind,
    headerIssueCount: result.headerDiff.missing.length + result.headerDiff.extra.length,
  };
}

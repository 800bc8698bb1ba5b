export type FindingSeverity = 'error' | 'warning';

export type FindingRuleId =
  | 'MISSING_HEADER'
  | 'DUPLICATE_HEADER'
  | 'ROW_FIELD_COUNT'
  | 'REQUIRED_EMPTY'
  | 'INVALID_ENUM'
  | 'INVALID_DATE'
  | 'INVALID_TIME'
  | 'INVALID_NUMBER'
  | 'NUMBER_OUT_OF_RANGE'
  | 'PATTERN_MISMATCH'
  | 'TEXT_TOO_LONG'
  | 'SUBJECT_ID_UNKNOWN'
  | 'SUBJECT_ID_FULL_NAME'
  | 'SUBJECT_ID_INVALID';

/**
 * ValidationFinding (report model).
 *
 * Observation only: findings never stop a run and carry no auto-fix.
 */
export type ValidationFinding = {
  /** 1-based line in the source file; the header row for header-level findings. */
  row: number;
  /** Template column name; empty for row-level findings. */
  column: string;
  /** Cell text exactly as it appeared in the file. */
  currentValue: string;
  message: string;

  severity: FindingSeverity;
  /** Identifies the rule that produced the finding. */
  ruleId: FindingRuleId;
};

export type SubjectIdIssueKind = 'unknown' | 'full-name' | 'invalid';

export type SubjectIdIssue = ValidationFinding & {
  kind: SubjectIdIssueKind;
};

// ─── Cell Rules ───────────────────────────────────────────────────────────
// One check per column type. Each check receives a trimmed, non-empty value;
// emptiness and required-ness are handled by the engine.

import type {
  ColumnSpec,
  EnumeratedColumnSpec,
  FreeTextColumnSpec,
  NumberColumnSpec,
  PatternColumnSpec,
  SubjectIdColumnSpec,
  TimeColumnSpec,
} from '../template/SubmissionTemplate';
import { assessSubjectId } from './subjectIdPolicy';
import type {
  FindingRuleId,
  FindingSeverity,
  SubjectIdIssueKind,
} from './ValidationFinding';

export type CellIssue = {
  ruleId: FindingRuleId;
  severity: FindingSeverity;
  message: string;
  /** Set for subject-identifier findings only. */
  subjectIdKind?: SubjectIdIssueKind;
};

export type CellCheck = (value: string) => CellIssue | null;

const error = (ruleId: FindingRuleId, message: string): CellIssue => ({
  ruleId,
  severity: 'error',
  message,
});

// ─── Dates & Times ────────────────────────────────────────────────────────

const US_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;
const TIME_24H = /^([01]\d|2[0-3]):[0-5]\d$/;
const TIME_12H = /^(0?[1-9]|1[0-2]):[0-5]\d ?[AaPp][Mm]$/;

export const isLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

export const daysInMonth = (year: number, month: number): number => {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
};

/** `MM/DD/YYYY` with a real calendar day. */
export const isValidUsDate = (value: string): boolean => {
  const match = US_DATE.exec(value);
  if (!match) return false;
  const month = Number(match[1]);
  const day = Number(match[2]);
  const year = Number(match[3]);
  if (year < 1 || month < 1 || month > 12) return false;
  return day >= 1 && day <= daysInMonth(year, month);
};

export const isValidTime = (value: string, acceptTwelveHour: boolean): boolean =>
  TIME_24H.test(value) || (acceptTwelveHour && TIME_12H.test(value));

// ─── Numbers ──────────────────────────────────────────────────────────────

const DECIMAL = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

export const parseDecimal = (value: string): number | null => {
  if (!DECIMAL.test(value)) return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
};

// ─── Checks by column type ────────────────────────────────────────────────

const enumeratedCheck =
  (spec: EnumeratedColumnSpec): CellCheck =>
  (value) => {
    if (spec.values.includes(value)) return null;
    return error('INVALID_ENUM', `Must be one of: ${spec.values.join(', ')}.`);
  };

const dateCheck = (): CellCheck => (value) =>
  isValidUsDate(value) ? null : error('INVALID_DATE', 'Invalid date format.');

const timeCheck =
  (spec: TimeColumnSpec): CellCheck =>
  (value) =>
    isValidTime(value, spec.acceptTwelveHour)
      ? null
      : error('INVALID_TIME', 'Invalid time format.');

const numberCheck =
  (spec: NumberColumnSpec): CellCheck =>
  (value) => {
    const n = parseDecimal(value);
    if (n === null) return error('INVALID_NUMBER', 'Must be a number.');
    if (spec.min !== undefined && n < spec.min) {
      return error('NUMBER_OUT_OF_RANGE', `Value must be >= ${spec.min}.`);
    }
    if (spec.max !== undefined && n > spec.max) {
      return error('NUMBER_OUT_OF_RANGE', `Value must be <= ${spec.max}.`);
    }
    return null;
  };

const patternCheck = (spec: PatternColumnSpec): CellCheck => {
  const regex = new RegExp(spec.pattern, spec.flags);
  const message = spec.description ?? `Must match pattern: ${spec.pattern}`;
  return (value) => (regex.test(value) ? null : error('PATTERN_MISMATCH', message));
};

const freeTextCheck =
  (spec: FreeTextColumnSpec): CellCheck =>
  (value) => {
    if (spec.maxLength === undefined || value.length <= spec.maxLength) return null;
    return error(
      'TEXT_TOO_LONG',
      `Value exceeds maximum length of ${spec.maxLength} characters.`,
    );
  };

const subjectIdCheck =
  (spec: SubjectIdColumnSpec): CellCheck =>
  (value) => {
    const assessment = assessSubjectId(value, spec.policy);
    if (!assessment) return null;
    return {
      ruleId: assessment.ruleId,
      severity: 'warning',
      message: assessment.message,
      subjectIdKind: assessment.kind,
    };
  };

const noCheck: CellCheck = () => null;

/**
 * Build the cell check for a column once per run.
 */
export function compileCellCheck(spec: ColumnSpec): CellCheck {
  switch (spec.type) {
    case 'enumerated':
      return enumeratedCheck(spec);
    case 'date':
      return dateCheck();
    case 'time':
      return timeCheck(spec);
    case 'number':
      return numberCheck(spec);
    case 'pattern':
      return patternCheck(spec);
    case 'free-text':
      return freeTextCheck(spec);
    case 'subject-id':
      return subjectIdCheck(spec);
    case 'other':
      return noCheck;
  }
}

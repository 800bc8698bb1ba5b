import { groupFindingsByColumnIssue } from '../validation/findingCategories';
import type { SubjectIdIssue, ValidationFinding } from '../validation/ValidationFinding';
import {
  type HeaderDiff,
  type ResultSummary,
  summarizeResult,
  type ValidationResult,
  type ValidationStatus,
} from '../validation/ValidationResult';

/**
 * Machine-readable report. Mirrors ValidationResult field for field, plus the
 * derived summary; plain JSON data with no shared references to the result.
 */
export type StructuredReport = {
  status: ValidationStatus;
  templateId: string;
  templateVersion: string;
  summary: ResultSummary;
  headerDiff: {
    missing: string[];
    extra: string[];
    matched: string[];
  };
  errors: ValidationFinding[];
  warnings: ValidationFinding[];
  subjectIdIssues: SubjectIdIssue[];
};

const RULE = '='.repeat(60);

export function toStructured(result: ValidationResult): StructuredReport {
  return {
    status: result.status,
    templateId: result.templateId,
    templateVersion: result.templateVersion,
    summary: summarizeResult(result),
    headerDiff: {
      missing: [...result.headerDiff.missing],
      extra: [...result.headerDiff.extra],
      matched: [...result.headerDiff.matched],
    },
    errors: result.errors.map((f) => ({ ...f })),
    warnings: result.warnings.map((f) => ({ ...f })),
    subjectIdIssues: result.subjectIdIssues.map((f) => ({ ...f })),
  };
}

// Quoted so that stray spaces and line breaks stay visible.
const quote = (value: string) => JSON.stringify(value);

const headerSection = (diff: HeaderDiff): string[] => {
  const block = (label: string, marker: string, names: readonly string[]) => [
    `  ${label} (${names.length}):`,
    ...(names.length > 0 ? names.map((n) => `    ${marker} ${quote(n)}`) : ['    None']),
  ];
  return [
    'HEADERS',
    ...block('Matched', '=', diff.matched),
    ...block('Missing', '-', diff.missing),
    ...block('Extra', '+', diff.extra),
  ];
};

const findingLines = (finding: ValidationFinding, index: number, tag: string): string[] => {
  const where = finding.column
    ? `Row ${finding.row}, ${quote(finding.column)}`
    : `Row ${finding.row}`;
  return [
    `  ${index + 1}. ${where}: ${finding.message} [${tag}]`,
    `     Value: ${quote(finding.currentValue)}`,
  ];
};

const findingSection = <T extends ValidationFinding>(
  title: string,
  findings: readonly T[],
  tagFor: (finding: T) => string,
): string[] => [
  `${title} (${findings.length})`,
  ...(findings.length > 0
    ? findings.flatMap((f, i) => findingLines(f, i, tagFor(f)))
    : ['  None']),
];

const issueGroupSection = (errors: readonly ValidationFinding[]): string[] => {
  const groups = groupFindingsByColumnIssue(errors);
  if (groups.length === 0) return ['DATA VALIDATION ISSUES', '  None'];
  return [
    'DATA VALIDATION ISSUES',
    ...groups.flatMap((g) => [
      `  ${String(g.count).padStart(3)} x ${g.column ? quote(g.column) : '(row)'}: ${g.category}`,
      `       Example: ${quote(g.example)}`,
      `       Fix: ${g.fix}`,
    ]),
  ];
};

/** Next steps for the submitter, derived from the result alone. */
export function recommendationsFor(result: ValidationResult): string[] {
  const out: string[] = [];
  if (result.headerDiff.missing.length > 0) out.push('Fix missing headers before resubmission.');
  if (result.errors.length > 0) out.push(`Address ${result.errors.length} validation error(s).`);
  if (result.warnings.length > 0) {
    out.push(`Review ${result.warnings.length} warning(s) for data quality.`);
  }
  if (result.subjectIdIssues.length > 0) {
    out.push(`Fix ${result.subjectIdIssues.length} subject ID format issue(s).`);
  }
  if (
    result.headerDiff.missing.length === 0 &&
    result.errors.length === 0 &&
    result.subjectIdIssues.length === 0
  ) {
    out.push('File is ready for submission.');
  }
  return out;
}

const ruleTag = (finding: ValidationFinding) => finding.ruleId;

const subjectIdTag = (issue: SubjectIdIssue) => `${issue.ruleId}, ${issue.kind}`;

/**
 * Human-readable report with the same content as `toStructured`.
 */
export function toText(result: ValidationResult): string {
  const summary = summarizeResult(result);
  const byKind = summary.subjectIdIssuesByKind;

  const lines = [
    'VALIDATION REPORT',
    RULE,
    `Status: ${result.status}`,
    `Template: ${result.templateId} (version ${result.templateVersion})`,
    '',
    'SUMMARY',
    `  Rows validated: ${summary.totalRows}`,
    `  Errors: ${summary.errorCount}`,
    `  Warnings: ${summary.warningCount}`,
    `  Subject ID issues: ${summary.subjectIdIssueCount} (unknown: ${byKind.unknown}, full-name: ${byKind['full-name']}, invalid: ${byKind.invalid})`,
    `  Header issues: ${summary.headerIssueCount}`,
    '',
    ...headerSection(result.headerDiff),
    '',
    ...findingSection('ERRORS', result.errors, ruleTag),
    '',
    ...findingSection('WARNINGS', result.warnings, ruleTag),
    '',
    ...findingSection('SUBJECT ID ISSUES', result.subjectIdIssues, subjectIdTag),
    '',
    ...issueGroupSection(result.errors),
    '',
    'RECOMMENDATIONS',
    ...recommendationsFor(result).map((r) => `  - ${r}`),
    RULE,
  ];

  return lines.join('\n');
}

/** One line for batch progress output. */
export function toSummaryLine(fileName: string, result: ValidationResult): string {
  const summary = summarizeResult(result);
  return `${fileName}: ${result.status.toUpperCase()} - ${summary.totalRows} rows, ${summary.errorCount} errors, ${summary.warningCount} warnings, ${summary.subjectIdIssueCount} subject ID issues`;
}

import type { CsvDocument, DocumentRow } from '../csv/CsvDocumentParser';
import type { ColumnSpec, SubmissionTemplate } from '../template/SubmissionTemplate';
import { deepFreeze } from '../utils/deepFreeze';
import { type CellCheck, compileCellCheck } from './cellRules';
import type { SubjectIdIssue, ValidationFinding } from './ValidationFinding';
import { deriveStatus, type HeaderDiff, type ValidationResult } from './ValidationResult';

type CompiledColumn = {
  spec: ColumnSpec;
  check: CellCheck;
};

const hasOwn = (record: Readonly<Record<string, string>>, key: string) =>
  Object.prototype.hasOwnProperty.call(record, key);

const unique = (values: readonly string[]): string[] => Array.from(new Set(values));

export function compareHeaders(
  template: SubmissionTemplate,
  headers: readonly string[],
): HeaderDiff {
  const present = new Set(headers);
  const expected = new Set(template.columns.map((c) => c.name));

  return {
    missing: template.columns.filter((c) => !present.has(c.name)).map((c) => c.name),
    extra: unique(headers.filter((h) => !expected.has(h))),
    matched: template.columns.filter((c) => present.has(c.name)).map((c) => c.name),
  };
}

const findDuplicateHeaders = (headers: readonly string[]): string[] => {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const h of headers) {
    if (seen.has(h)) dupes.add(h);
    seen.add(h);
  }
  return Array.from(dupes);
};

/**
 * Findings sort by row, then by template column order. Row-level findings
 * (no column) lead their row; columns the template does not know trail it.
 */
const findingComparator = (template: SubmissionTemplate) => {
  const rank = new Map(template.columns.map((c, index) => [c.name, index]));
  const columnRank = (column: string) =>
    column === '' ? -1 : (rank.get(column) ?? template.columns.length);

  return (a: ValidationFinding, b: ValidationFinding) =>
    a.row - b.row || columnRank(a.column) - columnRank(b.column);
};

/**
 * Validate one parsed CSV document against one template.
 *
 * Pure and deterministic: no I/O, inputs are not touched, and every anomaly
 * in the data becomes a finding on the returned (frozen) result.
 */
export function validate(
  template: SubmissionTemplate,
  document: CsvDocument,
): ValidationResult {
  const headerDiff = compareHeaders(template, document.headers);
  const errors: ValidationFinding[] = [];
  const warnings: ValidationFinding[] = [];
  const subjectIdIssues: SubjectIdIssue[] = [];

  // Header gate: a missing column is reported once, never per row.
  const missing = new Set(headerDiff.missing);
  for (const column of template.columns) {
    if (column.required && missing.has(column.name)) {
      errors.push({
        row: document.headerRow,
        column: column.name,
        currentValue: '',
        message: `Missing required header: ${column.name}`,
        severity: 'error',
        ruleId: 'MISSING_HEADER',
      });
    }
  }

  for (const header of findDuplicateHeaders(document.headers)) {
    errors.push({
      row: document.headerRow,
      column: header,
      currentValue: header,
      message: `Duplicate header: ${header}`,
      severity: 'error',
      ruleId: 'DUPLICATE_HEADER',
    });
  }

  const compiled: CompiledColumn[] = template.columns
    .filter((c) => !missing.has(c.name))
    .map((spec) => ({ spec, check: compileCellCheck(spec) }));

  const expectedFields = document.headers.length;

  const validateRow = (row: DocumentRow) => {
    if (row.fields.length !== expectedFields) {
      errors.push({
        row: row.rowNumber,
        column: '',
        currentValue: '',
        message: `Row has ${row.fields.length} fields, expected ${expectedFields}.`,
        severity: 'error',
        ruleId: 'ROW_FIELD_COUNT',
      });
    }

    for (const { spec, check } of compiled) {
      // Short rows: absent cells are covered by the field-count finding.
      if (!hasOwn(row.values, spec.name)) continue;

      const currentValue = row.values[spec.name];
      const value = currentValue.trim();

      if (value === '') {
        if (spec.required) {
          errors.push({
            row: row.rowNumber,
            column: spec.name,
            currentValue,
            message: 'Required field is empty.',
            severity: 'error',
            ruleId: 'REQUIRED_EMPTY',
          });
        }
        continue;
      }

      const issue = check(value);
      if (!issue) continue;

      const finding: ValidationFinding = {
        row: row.rowNumber,
        column: spec.name,
        currentValue,
        message: issue.message,
        severity: issue.severity,
        ruleId: issue.ruleId,
      };

      if (issue.severity === 'error') {
        errors.push(finding);
      } else {
        warnings.push(finding);
      }

      if (issue.subjectIdKind) {
        subjectIdIssues.push({ ...finding, kind: issue.subjectIdKind });
      }
    }
  };

  for (const row of document.rows) {
    validateRow(row);
  }

  const byPosition = findingComparator(template);
  errors.sort(byPosition);
  warnings.sort(byPosition);
  subjectIdIssues.sort(byPosition);

  return deepFreeze({
    templateId: template.templateId,
    templateVersion: template.templateVersion,
    totalRows: document.rows.length,
    headerDiff,
    errors,
    warnings,
    subjectIdIssues,
    status: deriveStatus(errors, warnings),
  });
}

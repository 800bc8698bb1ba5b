import { parseCsv } from '../../csv/CsvDocumentParser';
import { loadTemplate } from '../../template/TemplateLoader';
import { validate } from '../../validation/SubmissionValidationEngine';
import { escapeHtml, renderDashboardHtml } from '../DashboardRenderer';
import { toStructured, toSummaryLine, toText } from '../ReportFormatter';

const template = loadTemplate({
  templateId: 'report-test',
  templateVersion: '7',
  columns: [
    { name: 'subject_id', type: 'subject-id', required: true },
    { name: 'Injury', type: 'enumerated', required: true, values: ['Yes', 'No'] },
  ],
});

const result = validate(template, parseCsv('subject_id,Injury,Extra\nJohn Smith,yes,x'));

describe('toText', () => {
  test('lays out every section', () => {
    expect(toText(result).split('\n')).toEqual([
      'VALIDATION REPORT',
      '='.repeat(60),
      'Status: Failed',
      'Template: report-test (version 7)',
      '',
      'SUMMARY',
      '  Rows validated: 1',
      '  Errors: 1',
      '  Warnings: 1',
      '  Subject ID issues: 1 (unknown: 0, full-name: 1, invalid: 0)',
      '  Header issues: 1',
      '',
      'HEADERS',
      '  Matched (2):',
      '    = "subject_id"',
      '    = "Injury"',
      '  Missing (0):',
      '    None',
      '  Extra (1):',
      '    + "Extra"',
      '',
      'ERRORS (1)',
      '  1. Row 2, "Injury": Must be one of: Yes, No. [INVALID_ENUM]',
      '     Value: "yes"',
      '',
      'WARNINGS (1)',
      '  1. Row 2, "subject_id": Subject ID appears to be a full name. Use initials instead. [SUBJECT_ID_FULL_NAME]',
      '     Value: "John Smith"',
      '',
      'SUBJECT ID ISSUES (1)',
      '  1. Row 2, "subject_id": Subject ID appears to be a full name. Use initials instead. [SUBJECT_ID_FULL_NAME, full-name]',
      '     Value: "John Smith"',
      '',
      'DATA VALIDATION ISSUES',
      '    1 x "Injury": Invalid Dropdown Values',
      '       Example: "yes"',
      '       Fix: Use the exact value from the dropdown list.',
      '',
      'RECOMMENDATIONS',
      '  - Address 1 validation error(s).',
      '  - Review 1 warning(s) for data quality.',
      '  - Fix 1 subject ID format issue(s).',
      '='.repeat(60),
    ]);
  });

  test('row-level findings have no column label', () => {
    const shortRow = validate(template, parseCsv('subject_id,Injury\nJD'));
    const lines = toText(shortRow).split('\n');
    expect(lines).toContain('  1. Row 2: Row has 1 fields, expected 2. [ROW_FIELD_COUNT]');
  });

  test('empty sections say None', () => {
    const clean = validate(template, parseCsv('subject_id,Injury\nJD,No'));
    const lines = toText(clean).split('\n');
    expect(lines[2]).toBe('Status: Passed');
    expect(lines.slice(lines.indexOf('ERRORS (0)'), lines.indexOf('ERRORS (0)') + 2)).toEqual([
      'ERRORS (0)',
      '  None',
    ]);
  });

  test('groups errors per column issue, most frequent first', () => {
    const many = validate(template, parseCsv('subject_id,Injury\nJD,yes\nJD\n,no\nJD,maybe'));
    const lines = toText(many).split('\n');
    const start = lines.indexOf('DATA VALIDATION ISSUES');

    expect(lines.slice(start, start + 10)).toEqual([
      'DATA VALIDATION ISSUES',
      '    3 x "Injury": Invalid Dropdown Values',
      '       Example: "yes"',
      '       Fix: Use the exact value from the dropdown list.',
      '    1 x (row): Structural Issues',
      '       Example: ""',
      '       Fix: Make every row carry one value per header; check for stray commas or quotes.',
      '    1 x "subject_id": Missing Values',
      '       Example: ""',
      '       Fix: Fill in every required column.',
    ]);
  });

  test('a clean file is ready for submission', () => {
    const clean = validate(template, parseCsv('subject_id,Injury\nJD,No'));
    const lines = toText(clean).split('\n');

    expect(lines.slice(lines.indexOf('RECOMMENDATIONS'))).toEqual([
      'RECOMMENDATIONS',
      '  - File is ready for submission.',
      '='.repeat(60),
    ]);
    expect(lines).toContain('DATA VALIDATION ISSUES');
  });

  test('carries every structured value', () => {
    const text = toText(result);
    const report = toStructured(result);

    for (const finding of [...report.errors, ...report.warnings, ...report.subjectIdIssues]) {
      expect(text).toContain(`Row ${finding.row}, ${JSON.stringify(finding.column)}: ${finding.message}`);
      expect(text).toContain(`Value: ${JSON.stringify(finding.currentValue)}`);
    }
    for (const name of [...report.headerDiff.matched, ...report.headerDiff.extra]) {
      expect(text).toContain(JSON.stringify(name));
    }
    expect(text).toContain(`Status: ${report.status}`);
  });
});

describe('toStructured', () => {
  test('mirrors the result and adds the summary', () => {
    const report = toStructured(result);

    expect(report.status).toBe('Failed');
    expect(report.templateId).toBe('report-test');
    expect(report.headerDiff).toEqual(result.headerDiff);
    expect(report.errors).toEqual(result.errors);
    expect(report.subjectIdIssues).toEqual(result.subjectIdIssues);
    expect(report.summary).toEqual({
      totalRows: 1,
      errorCount: 1,
      warningCount: 1,
      subjectIdIssueCount: 1,
      subjectIdIssuesByKind: { unknown: 0, 'full-name': 1, invalid: 0 },
      headerIssueCount: 1,
    });
  });

  test('is plain data detached from the result', () => {
    const report = toStructured(result);

    expect(JSON.parse(JSON.stringify(report))).toEqual(report);
    expect(report.errors).not.toBe(result.errors);
    expect(Object.isFrozen(report.errors)).toBe(false);
  });
});

describe('toSummaryLine', () => {
  test('condenses a run to one line', () => {
    expect(toSummaryLine('march.csv', result)).toBe(
      'march.csv: FAILED - 1 rows, 1 errors, 1 warnings, 1 subject ID issues',
    );
  });
});

describe('renderDashboardHtml', () => {
  test('escapes everything taken from the file', () => {
    const hostile = validate(template, parseCsv('subject_id,Injury\nJD,<script>'));
    const html = renderDashboardHtml(hostile, {
      fileName: '<b>&"x".csv',
      generatedAt: '2026-01-02T03:04:05.000Z',
    });

    expect(html).toContain('<title>Validation Results - &lt;b&gt;&amp;&quot;x&quot;.csv</title>');
    expect(html).toContain('Row 2 | Value: &quot;&lt;script&gt;&quot; | INVALID_ENUM');
    expect(html).not.toContain('<script>');
  });

  test('shows status and the error summary table', () => {
    const html = renderDashboardHtml(result, { fileName: 'a.csv', generatedAt: '2026-01-02T03:04:05.000Z' });

    expect(html).toContain('>Validation Failed</span>');
    expect(html).toContain(
      '<tr><td>Invalid Dropdown Values</td><td>1</td><td>&quot;yes&quot;</td><td>Use the exact value from the dropdown list.</td></tr>',
    );
    expect(html).toContain('Unknown values: 0 | Full names: 1 | Invalid format: 0');
  });

  test('escapeHtml covers the five special characters', () => {
    expect(escapeHtml(`a&b<c>d"e'f`)).toBe('a&amp;b&lt;c&gt;d&quot;e&#39;f');
  });
});

import { parseCsv } from '../../csv/CsvDocumentParser';
import { loadTemplate } from '../../template/TemplateLoader';
import { compareHeaders, validate } from '../SubmissionValidationEngine';

const template = loadTemplate({
  templateId: 'engine-test',
  templateVersion: '1',
  columns: [
    { name: 'Name', type: 'free-text', required: true },
    { name: 'Date', type: 'date', required: true },
    { name: 'Time', type: 'time', required: true, acceptTwelveHour: false },
    { name: 'subject_id', type: 'subject-id', required: true },
    { name: 'Injury', type: 'enumerated', required: true, values: ['Yes', 'No'] },
    { name: 'Notes', type: 'other' },
  ],
});

const HEADER = 'Name,Date,Time,subject_id,Injury,Notes';

const csv = (...rows: string[]) => [HEADER, ...rows].join('\n');

const run = (text: string) => validate(template, parseCsv(text));

describe('validate', () => {
  test('a clean file passes', () => {
    const result = run(csv('Acme,02/29/2024,08:21,JD,Yes,', 'Beta,12/31/2023,23:59,J.D.,No,late'));

    expect(result.status).toBe('Passed');
    expect(result.totalRows).toBe(2);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(result.subjectIdIssues).toEqual([]);
    expect(result.headerDiff).toEqual({
      missing: [],
      extra: [],
      matched: ['Name', 'Date', 'Time', 'subject_id', 'Injury', 'Notes'],
    });
    expect(result.templateId).toBe('engine-test');
    expect(result.templateVersion).toBe('1');
  });

  test('a missing required header is one finding, never one per row', () => {
    const result = run(
      ['Name,Time,subject_id,Injury,Notes', 'Acme,08:21,JD,Yes,x', 'Beta,09:00,JD,No,y'].join('\n'),
    );

    expect(result.headerDiff.missing).toEqual(['Date']);
    expect(result.errors).toEqual([
      {
        row: 1,
        column: 'Date',
        currentValue: '',
        message: 'Missing required header: Date',
        severity: 'error',
        ruleId: 'MISSING_HEADER',
      },
    ]);
    expect(result.status).toBe('Failed');
  });

  test('a missing optional header is listed but not an error', () => {
    const result = run(['Name,Date,Time,subject_id,Injury', 'Acme,01/02/2024,08:21,JD,Yes'].join('\n'));

    expect(result.headerDiff.missing).toEqual(['Notes']);
    expect(result.errors).toEqual([]);
    expect(result.status).toBe('Passed');
  });

  test('header findings use the header line when blank lines lead the file', () => {
    const result = run(['', 'Name,Time,subject_id,Injury,Notes', 'Acme,08:21,JD,Yes,'].join('\n'));
    expect(result.errors[0].row).toBe(2);
  });

  test('extra headers are listed without a finding', () => {
    const result = run(`${HEADER},Extra\nAcme,01/02/2024,08:21,JD,Yes,,whatever`);

    expect(result.headerDiff.extra).toEqual(['Extra']);
    expect(result.errors).toEqual([]);
    expect(result.status).toBe('Passed');
  });

  test('duplicate headers are errors', () => {
    const result = run(`${HEADER},Name\nAcme,01/02/2024,08:21,JD,Yes,,Again`);

    expect(result.errors).toEqual([
      {
        row: 1,
        column: 'Name',
        currentValue: 'Name',
        message: 'Duplicate header: Name',
        severity: 'error',
        ruleId: 'DUPLICATE_HEADER',
      },
    ]);
    expect(result.headerDiff.extra).toEqual([]);
  });

  test('enumerated values must match exactly', () => {
    const result = run(csv('Acme,01/02/2024,08:21,JD,yes,'));

    expect(result.errors).toEqual([
      {
        row: 2,
        column: 'Injury',
        currentValue: 'yes',
        message: 'Must be one of: Yes, No.',
        severity: 'error',
        ruleId: 'INVALID_ENUM',
      },
    ]);
  });

  test('values are trimmed for checks but reported as written', () => {
    const result = run(csv('Acme,01/02/2024 ,08:21, JD, Maybe ,'));

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].currentValue).toBe(' Maybe ');
  });

  test('required cells must not be blank; optional ones may be', () => {
    const result = run(csv('  ,01/02/2024,08:21,JD,Yes,'));

    expect(result.errors).toEqual([
      {
        row: 2,
        column: 'Name',
        currentValue: '  ',
        message: 'Required field is empty.',
        severity: 'error',
        ruleId: 'REQUIRED_EMPTY',
      },
    ]);
  });

  test('subject identifiers are warnings and subject ID issues', () => {
    const result = run(csv('Acme,01/02/2024,08:21,John Smith,Yes,', 'Beta,01/02/2024,08:21,unknown,No,'));

    expect(result.status).toBe('Warning');
    expect(result.errors).toEqual([]);
    expect(result.warnings.map((w) => [w.row, w.ruleId])).toEqual([
      [2, 'SUBJECT_ID_FULL_NAME'],
      [3, 'SUBJECT_ID_UNKNOWN'],
    ]);
    expect(result.subjectIdIssues).toEqual([
      {
        row: 2,
        column: 'subject_id',
        currentValue: 'John Smith',
        message: 'Subject ID appears to be a full name. Use initials instead.',
        severity: 'warning',
        ruleId: 'SUBJECT_ID_FULL_NAME',
        kind: 'full-name',
      },
      {
        row: 3,
        column: 'subject_id',
        currentValue: 'unknown',
        message: 'Subject ID should not be "unknown".',
        severity: 'warning',
        ruleId: 'SUBJECT_ID_UNKNOWN',
        kind: 'unknown',
      },
    ]);
  });

  test('a short row gets a structural finding plus checks on the fields it has', () => {
    const result = run(csv('Acme,13/01/2024,08:21'));

    expect(result.errors).toEqual([
      {
        row: 2,
        column: '',
        currentValue: '',
        message: 'Row has 3 fields, expected 6.',
        severity: 'error',
        ruleId: 'ROW_FIELD_COUNT',
      },
      {
        row: 2,
        column: 'Date',
        currentValue: '13/01/2024',
        message: 'Invalid date format.',
        severity: 'error',
        ruleId: 'INVALID_DATE',
      },
    ]);
  });

  test('findings are ordered by row, then by template column order', () => {
    const result = run(csv('Acme,01/02/2024,08:21,JD,maybe,', 'Beta,99/99/2024,8pm,JD,No,', ',01/02/2024,08:21,JD,No,'));

    expect(result.errors.map((e) => [e.row, e.column])).toEqual([
      [2, 'Injury'],
      [3, 'Date'],
      [3, 'Time'],
      [4, 'Name'],
    ]);
  });

  test('runs are deterministic and leave the inputs untouched', () => {
    const document = parseCsv(csv('Acme,02/30/2024,25:00,Jane Doe,Nope,'));
    const before = JSON.stringify(document);

    const first = validate(template, document);
    const second = validate(template, document);

    expect(second).toEqual(first);
    expect(JSON.stringify(document)).toBe(before);
  });

  test('results are deeply frozen', () => {
    const result = run(csv('Acme,02/30/2024,08:21,JD,Yes,'));

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.errors)).toBe(true);
    expect(Object.isFrozen(result.errors[0])).toBe(true);
    expect(Object.isFrozen(result.headerDiff.matched)).toBe(true);
  });
});

describe('compareHeaders', () => {
  test('splits headers into matched, missing and extra', () => {
    expect(compareHeaders(template, ['Notes', 'Name', 'Colour', 'Colour'])).toEqual({
      missing: ['Date', 'Time', 'subject_id', 'Injury'],
      extra: ['Colour'],
      matched: ['Name', 'Notes'],
    });
  });

  test('is case and whitespace sensitive', () => {
    expect(compareHeaders(template, ['name', 'Date ']).matched).toEqual([]);
  });
});

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { loadTemplate } from '../../template/TemplateLoader';
import {
  fileTimestamp,
  mapWithConcurrency,
  outputStems,
  runBatchValidation,
} from '../BatchValidationRunner';

const template = loadTemplate({
  templateId: 'batch-test',
  templateVersion: '3',
  columns: [
    { name: 'Name', type: 'free-text', required: true },
    { name: 'Injury', type: 'enumerated', required: true, values: ['Yes', 'No'] },
    { name: 'subject_id', type: 'subject-id' },
  ],
});

const FIXED_NOW = new Date('2026-03-04T05:06:07.000Z');

let workDir: string;
let inputDir: string;
let outputDir: string;

const writeInput = (name: string, content: string) =>
  fs.writeFile(path.join(inputDir, name), content, 'utf8');

const readJson = async (file: string): Promise<unknown> =>
  JSON.parse(await fs.readFile(path.join(outputDir, file), 'utf8'));

const run = (overrides: Partial<Parameters<typeof runBatchValidation>[0]> = {}) => {
  const lines: string[] = [];
  const result = runBatchValidation({
    template,
    inputDir,
    outputDir,
    concurrency: 1,
    writeText: true,
    writeDashboard: false,
    summaryOnly: true,
    log: (line) => lines.push(line),
    now: () => FIXED_NOW,
    ...overrides,
  });
  return { result, lines };
};

describe('runBatchValidation', () => {
  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'batch-validation-'));
    inputDir = path.join(workDir, 'input_source');
    outputDir = path.join(workDir, 'output');
    await fs.mkdir(inputDir);
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(workDir, { recursive: true, force: true });
  });

  test('validates every CSV file and writes reports plus a summary', async () => {
    await writeInput('a_pass.csv', 'Name,Injury,subject_id\nAcme,Yes,JD\n');
    await writeInput('b_fail.CSV', 'Name,Injury,subject_id\nAcme,maybe,JD\n');
    await writeInput('c_broken.csv', 'Name,Injury,subject_id\nAcme,\u0000,JD\n');
    await writeInput('notes.txt', 'not a submission');

    const { result, lines } = run();
    const outcome = await result;

    const summaryName = 'validation_summary_20260304_050607.json';
    expect(outcome.exitCode).toBe(1);
    expect(outcome.summaryPath).toBe(path.join(outputDir, summaryName));
    expect(lines).toEqual([
      'a_pass.csv: PASSED - 1 rows, 0 errors, 0 warnings, 0 subject ID issues',
      'b_fail.CSV: FAILED - 1 rows, 1 errors, 0 warnings, 0 subject ID issues',
      'c_broken.csv: COULD NOT PROCESS - File appears to be binary, not CSV text.',
      'Validated 3 file(s): 1 passed, 0 with warnings, 1 failed, 1 could not be processed.',
      `Summary written to ${path.join(outputDir, summaryName)}`,
    ]);

    expect((await fs.readdir(outputDir)).sort()).toEqual([
      'a_pass_report.txt',
      'a_pass_validation.json',
      'b_fail_report.txt',
      'b_fail_validation.json',
      summaryName,
    ]);

    expect(await readJson('a_pass_validation.json')).toMatchObject({
      file: 'a_pass.csv',
      validatedAt: '2026-03-04T05:06:07.000Z',
      report: { status: 'Passed', templateId: 'batch-test', errors: [] },
    });

    const text = await fs.readFile(path.join(outputDir, 'b_fail_report.txt'), 'utf8');
    expect(text.split('\n').slice(0, 3)).toEqual(['VALIDATION REPORT', '='.repeat(60), 'Status: Failed']);

    expect(await readJson(summaryName)).toMatchObject({
      runAt: '2026-03-04T05:06:07.000Z',
      inputDir,
      outputDir,
      template: { templateId: 'batch-test', templateVersion: '3' },
      totals: { files: 3, passed: 1, warning: 0, failed: 1, unprocessable: 1 },
      files: [
        { file: 'a_pass.csv', outcome: 'passed', status: 'Passed' },
        { file: 'b_fail.CSV', outcome: 'failed', status: 'Failed', summary: { errorCount: 1 } },
        {
          file: 'c_broken.csv',
          outcome: 'unprocessable',
          error: { code: 'CSV_PARSE_ERROR', message: 'File appears to be binary, not CSV text.' },
          outputs: [],
        },
      ],
    });
  });

  test('warnings alone do not fail the run', async () => {
    await writeInput('only.csv', 'Name,Injury,subject_id\nAcme,No,John Smith\n');

    const outcome = await run().result;

    expect(outcome.exitCode).toBe(0);
    expect(outcome.summary?.totals).toEqual({ files: 1, passed: 0, warning: 1, failed: 0, unprocessable: 0 });
  });

  test('dashboard and text outputs follow the options', async () => {
    await writeInput('x.csv', 'Name,Injury,subject_id\nAcme,Yes,JD\n');

    const outcome = await run({ writeText: false, writeDashboard: true }).result;

    expect(outcome.summary?.files[0].outputs).toEqual(['x_validation.json', 'x_dashboard.html']);
    const html = await fs.readFile(path.join(outputDir, 'x_dashboard.html'), 'utf8');
    expect(html).toContain('<title>Validation Results - x.csv</title>');
  });

  test('prints the full text report unless asked for one line', async () => {
    await writeInput('x.csv', 'Name,Injury,subject_id\nAcme,Yes,JD\n');

    const { result, lines } = run({ summaryOnly: false });
    await result;

    expect(lines[0].split('\n').slice(0, 2)).toEqual(['File: x.csv', 'VALIDATION REPORT']);
  });

  test('creates a missing input folder and stops', async () => {
    const missing = path.join(workDir, 'incoming');

    const { result, lines } = run({ inputDir: missing });
    const outcome = await result;

    expect(outcome).toEqual({ summary: null, summaryPath: null, exitCode: 0 });
    expect(lines).toEqual([`Created input folder ${missing}. Add CSV files to it and run again.`]);
    expect((await fs.stat(missing)).isDirectory()).toBe(true);
  });

  test('an input folder without CSV files is not an error', async () => {
    const { result, lines } = run();

    expect((await result).exitCode).toBe(0);
    expect(lines).toEqual([`No CSV files found in ${inputDir}.`]);
  });
});

describe('mapWithConcurrency', () => {
  test('keeps input order and never exceeds the limit', async () => {
    let inFlight = 0;
    let peak = 0;

    const out = await mapWithConcurrency([30, 5, 20, 1, 10], 2, async (ms, i) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, ms));
      inFlight -= 1;
      return i * 10;
    });

    expect(out).toEqual([0, 10, 20, 30, 40]);
    expect(peak).toBe(2);
  });

  test('handles an empty list', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});

describe('outputStems', () => {
  test('uses the bare stem unless two inputs share it', () => {
    expect(Array.from(outputStems(['a.csv', 'a.CSV', 'b.csv', 'B.Csv', 'c.csv']))).toEqual([
      ['a.csv', 'a_csv'],
      ['a.CSV', 'a_CSV'],
      ['b.csv', 'b_csv'],
      ['B.Csv', 'B_Csv'],
      ['c.csv', 'c'],
    ]);
  });
});

describe('fileTimestamp', () => {
  test('formats UTC time for file names', () => {
    expect(fileTimestamp(new Date('2025-09-23T08:21:05.000Z'))).toBe('20250923_082105');
  });
});

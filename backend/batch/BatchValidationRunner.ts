// ─── Batch Validation Runner ──────────────────────────────────────────────
// Validates every CSV file in an input folder and writes per-file reports
// plus one run summary into an output folder.

import fs from 'node:fs/promises';
import path from 'node:path';

import { clampConcurrency } from '../config/validatorConfig';
import { type SubmissionRun, validateSubmission } from '../modules/validation/validation.service';
import {
  isUnprocessableInput,
  ValidatorError,
  type ValidatorErrorCode,
} from '../reliability/ValidatorError';
import { renderDashboardHtml } from '../report/DashboardRenderer';
import { toSummaryLine } from '../report/ReportFormatter';
import { telemetry } from '../telemetry/Telemetry';
import type { SubmissionTemplate } from '../template/SubmissionTemplate';
import {
  type ResultSummary,
  summarizeResult,
  type ValidationStatus,
} from '../validation/ValidationResult';

export type FileOutcome = 'passed' | 'warning' | 'failed' | 'unprocessable';

export type BatchFileEntry = {
  file: string;
  outcome: FileOutcome;
  status?: ValidationStatus;
  summary?: ResultSummary;
  error?: { code: ValidatorErrorCode; message: string };
  /** Report files written for this input, relative to the output folder. */
  outputs: string[];
};

export type BatchTotals = Record<FileOutcome, number> & { files: number };

export type BatchSummary = {
  runAt: string;
  durationMs: number;
  inputDir: string;
  outputDir: string;
  template: { templateId: string; templateVersion: string };
  totals: BatchTotals;
  files: BatchFileEntry[];
};

export type BatchOptions = {
  template: SubmissionTemplate;
  inputDir: string;
  outputDir: string;
  concurrency: number;
  writeText: boolean;
  writeDashboard: boolean;
  /** One line per file instead of the full text report. */
  summaryOnly: boolean;
  log?: (line: string) => void;
  now?: () => Date;
};

export type BatchRunResult = {
  /** Null when there was nothing to validate. */
  summary: BatchSummary | null;
  summaryPath: string | null;
  exitCode: 0 | 1;
};

const OUTCOME_BY_STATUS: Record<ValidationStatus, FileOutcome> = {
  Passed: 'passed',
  Warning: 'warning',
  Failed: 'failed',
};

const pad2 = (n: number) => String(n).padStart(2, '0');

/** `YYYYMMDD_HHMMSS` in UTC. */
export const fileTimestamp = (date: Date): string =>
  `${date.getUTCFullYear()}${pad2(date.getUTCMonth() + 1)}${pad2(date.getUTCDate())}_${pad2(
    date.getUTCHours(),
  )}${pad2(date.getUTCMinutes())}${pad2(date.getUTCSeconds())}`;

const isCsvFile = (name: string) => path.extname(name).toLowerCase() === '.csv';

const compareNames = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

const isMissingPath = (err: unknown) =>
  typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';

/** Returns true when the folder had to be created. */
const ensureDirectory = async (dir: string): Promise<boolean> => {
  try {
    await fs.access(dir);
    return false;
  } catch (err) {
    if (!isMissingPath(err)) throw err;
    await fs.mkdir(dir, { recursive: true });
    return true;
  }
};

export async function listCsvFiles(inputDir: string): Promise<string[]> {
  const entries = await fs.readdir(inputDir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && isCsvFile(e.name))
    .map((e) => e.name)
    .sort(compareNames);
}

/**
 * Output name stem per input file. Files whose stems collide (`a.csv` and
 * `a.CSV`) keep their extension in the stem instead.
 */
export function outputStems(files: readonly string[]): Map<string, string> {
  const stemOf = (file: string) => path.parse(file).name;
  const counts = new Map<string, number>();
  for (const file of files) {
    const key = stemOf(file).toLowerCase();
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return new Map(
    files.map((file) => {
      const stem = stemOf(file);
      const shared = (counts.get(stem.toLowerCase()) ?? 0) > 1;
      return [file, shared ? `${stem}_${path.extname(file).slice(1)}` : stem];
    }),
  );
}

const readSubmission = async (filePath: string): Promise<Uint8Array> => {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    throw new ValidatorError({
      code: 'IO_ERROR',
      message: `Could not read ${path.basename(filePath)}.`,
      cause: err,
    });
  }
};

/** Parse and read failures end one file's run; anything else ends the batch. */
const isSkippableFailure = (err: unknown): err is ValidatorError =>
  isUnprocessableInput(err) || (err instanceof ValidatorError && err.code === 'IO_ERROR');

const emptyTotals = (): BatchTotals => ({
  files: 0,
  passed: 0,
  warning: 0,
  failed: 0,
  unprocessable: 0,
});

/**
 * Run `task` over `items` with at most `limit` in flight. Results keep the
 * order of `items`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  const worker = async () => {
    while (true) {
      const idx = next;
      next += 1;
      if (idx >= items.length) return;
      results[idx] = await task(items[idx], idx);
    }
  };

  const workers = Math.min(Math.max(1, Math.trunc(limit)), Math.max(1, items.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}

export async function runBatchValidation(options: BatchOptions): Promise<BatchRunResult> {
  // eslint-disable-next-line no-console
  const log = options.log ?? ((line: string) => console.log(line));
  const now = options.now ?? (() => new Date());
  const { template, inputDir, outputDir } = options;

  if (await ensureDirectory(inputDir)) {
    log(`Created input folder ${inputDir}. Add CSV files to it and run again.`);
    return { summary: null, summaryPath: null, exitCode: 0 };
  }

  const files = await listCsvFiles(inputDir);
  if (files.length === 0) {
    log(`No CSV files found in ${inputDir}.`);
    return { summary: null, summaryPath: null, exitCode: 0 };
  }

  await fs.mkdir(outputDir, { recursive: true });

  const startedAt = now();
  const start = telemetry.nowMs();

  const stems = outputStems(files);

  const processFile = async (file: string): Promise<BatchFileEntry> => {
    const stem = stems.get(file) ?? path.parse(file).name;

    let run: SubmissionRun;
    try {
      const content = await readSubmission(path.join(inputDir, file));
      run = validateSubmission({ content, fileName: file, template });
    } catch (err) {
      if (!isSkippableFailure(err)) throw err;
      log(`${file}: COULD NOT PROCESS - ${err.message}`);
      return {
        file,
        outcome: 'unprocessable',
        error: { code: err.code, message: err.message },
        outputs: [],
      };
    }

    const outputs: string[] = [];
    const write = async (name: string, data: string) => {
      await fs.writeFile(path.join(outputDir, name), data, 'utf8');
      outputs.push(name);
    };

    const validatedAt = now().toISOString();
    await write(
      `${stem}_validation.json`,
      JSON.stringify({ file, validatedAt, report: run.report }, null, 2),
    );
    if (options.writeText) {
      await write(`${stem}_report.txt`, `${run.text}\n`);
    }
    if (options.writeDashboard) {
      await write(
        `${stem}_dashboard.html`,
        renderDashboardHtml(run.result, { fileName: file, generatedAt: validatedAt }),
      );
    }

    log(options.summaryOnly ? toSummaryLine(file, run.result) : `File: ${file}\n${run.text}`);

    return {
      file,
      outcome: OUTCOME_BY_STATUS[run.result.status],
      status: run.result.status,
      summary: summarizeResult(run.result),
      outputs,
    };
  };

  const entries = await mapWithConcurrency(
    files,
    clampConcurrency(options.concurrency),
    processFile,
  );

  const totals = emptyTotals();
  for (const entry of entries) {
    totals.files += 1;
    totals[entry.outcome] += 1;
  }

  const summary: BatchSummary = {
    runAt: startedAt.toISOString(),
    durationMs: telemetry.since(start),
    inputDir,
    outputDir,
    template: {
      templateId: template.templateId,
      templateVersion: template.templateVersion,
    },
    totals,
    files: entries,
  };

  const summaryPath = path.join(outputDir, `validation_summary_${fileTimestamp(startedAt)}.json`);
  await fs.writeFile(summaryPath, JSON.stringify(summary, null, 2), 'utf8');

  telemetry.record({
    name: 'batch.completed',
    durationMs: summary.durationMs,
    tags: { template: template.templateId },
    metrics: { ...totals },
  });

  log(
    `Validated ${totals.files} file(s): ${totals.passed} passed, ${totals.warning} with warnings, ${totals.failed} failed, ${totals.unprocessable} could not be processed.`,
  );
  log(`Summary written to ${summaryPath}`);

  return {
    summary,
    summaryPath,
    exitCode: totals.failed + totals.unprocessable > 0 ? 1 : 0,
  };
}

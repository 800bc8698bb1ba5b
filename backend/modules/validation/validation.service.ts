// ─── Validation Service ───────────────────────────────────────────────────
// One whole submission per call: Parse → Validate → Report.
// Shared by the API controller and the batch runner.

import { parseCsv } from '../../csv/CsvDocumentParser';
import { isUnprocessableInput } from '../../reliability/ValidatorError';
import { toStructured, toText, type StructuredReport } from '../../report/ReportFormatter';
import { telemetry } from '../../telemetry/Telemetry';
import type { SubmissionTemplate } from '../../template/SubmissionTemplate';
import { summarizeResult, type ValidationResult } from '../../validation/ValidationResult';
import { validate } from '../../validation/SubmissionValidationEngine';

export type SubmissionRun = {
  fileName: string;
  result: ValidationResult;
  report: StructuredReport;
  text: string;
};

/**
 * Validate raw CSV content against a template.
 *
 * Parse failures are rethrown unchanged (the caller reports them as
 * "could not process file"); they are also recorded as telemetry.
 */
export function validateSubmission(args: {
  content: string | Uint8Array;
  fileName: string;
  template: SubmissionTemplate;
}): SubmissionRun {
  const { content, fileName, template } = args;
  const start = telemetry.nowMs();

  let result: ValidationResult;
  try {
    result = validate(template, parseCsv(content));
  } catch (err) {
    if (isUnprocessableInput(err)) {
      telemetry.record({
        name: 'validation.unprocessable',
        durationMs: telemetry.since(start),
        tags: { file: fileName, code: err.code, template: template.templateId },
        message: err.message,
      });
    }
    throw err;
  }

  const summary = summarizeResult(result);
  telemetry.record({
    name: 'validation.run',
    durationMs: telemetry.since(start),
    tags: { file: fileName, status: result.status, template: template.templateId },
    metrics: {
      rows: summary.totalRows,
      errors: summary.errorCount,
      warnings: summary.warningCount,
      subjectIdIssues: summary.subjectIdIssueCount,
    },
  });

  return {
    fileName,
    result,
    report: toStructured(result),
    text: toText(result),
  };
}

export * from './template/SubmissionTemplate';
export {
  describeTemplate,
  findColumn,
  loadEmbeddedTemplate,
  loadTemplate,
  requiredColumnNames,
  resolveTemplate,
  templateColumnNames,
} from './template/TemplateLoader';
export type { SubmissionTemplateInput } from './template/templateSchema';

export { parseCsv, type CsvDocument, type DocumentRow } from './csv/CsvDocumentParser';

export { compareHeaders, validate } from './validation/SubmissionValidationEngine';
export * from './validation/ValidationFinding';
export * from './validation/ValidationResult';
export {
  categoryForRule,
  groupFindingsByCategory,
  groupFindingsByColumnIssue,
  type ColumnIssueGroup,
  type FindingCategory,
  type FindingCategoryGroup,
} from './validation/findingCategories';

export {
  recommendationsFor,
  toStructured,
  toSummaryLine,
  toText,
  type StructuredReport,
} from './report/ReportFormatter';
export { renderDashboardHtml, type DashboardMeta } from './report/DashboardRenderer';

export * from './reliability/ValidatorError';
export { loadValidatorConfig, type ValidatorConfig } from './config/validatorConfig';

export { validateSubmission, type SubmissionRun } from './modules/validation/validation.service';
export {
  runBatchValidation,
  type BatchOptions,
  type BatchRunResult,
  type BatchSummary,
} from './batch/BatchValidationRunner';

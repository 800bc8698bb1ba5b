import type { ZodIssue } from 'zod';

import { TemplateParseError } from '../reliability/ValidatorError';
import { deepFreeze } from '../utils/deepFreeze';
import defaultTemplateSource from './defaultTemplate.json';
import type {
  ColumnSpec,
  SubmissionTemplate,
  TemplateDescription,
} from './SubmissionTemplate';
import { submissionTemplateSchema } from './templateSchema';

const formatIssue = (issue: ZodIssue): string => {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
};

const parseJsonSource = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TemplateParseError(`Template is not valid JSON: ${reason}`, [], err);
  }
};

/**
 * Load a template from JSON text or an already-parsed payload.
 *
 * Defaults are filled in and the result is deeply frozen. Any structural
 * mismatch is a hard failure; there is no partial or degraded template.
 */
export function loadTemplate(source: unknown): SubmissionTemplate {
  const payload = typeof source === 'string' ? parseJsonSource(source) : source;

  const parsed = submissionTemplateSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(formatIssue);
    throw new TemplateParseError(
      `Template does not match the submission template format (${issues.length} issue${issues.length === 1 ? '' : 's'}).`,
      issues,
      parsed.error,
    );
  }

  const template: SubmissionTemplate = parsed.data;
  return deepFreeze(template);
}

let embeddedTemplate: SubmissionTemplate | null = null;

/** The template bundled with the validator, loaded once per process. */
export function loadEmbeddedTemplate(): SubmissionTemplate {
  if (!embeddedTemplate) {
    embeddedTemplate = loadTemplate(defaultTemplateSource);
  }
  return embeddedTemplate;
}

/**
 * An explicitly supplied template always replaces the embedded one wholesale.
 */
export function resolveTemplate(external?: unknown): SubmissionTemplate {
  if (external === undefined || external === null) return loadEmbeddedTemplate();
  return loadTemplate(external);
}

export const templateColumnNames = (template: SubmissionTemplate): string[] =>
  template.columns.map((c) => c.name);

export const requiredColumnNames = (template: SubmissionTemplate): string[] =>
  template.columns.filter((c) => c.required).map((c) => c.name);

export const findColumn = (
  template: SubmissionTemplate,
  name: string,
): ColumnSpec | undefined => template.columns.find((c) => c.name === name);

export function describeTemplate(template: SubmissionTemplate): TemplateDescription {
  const columnsByType: TemplateDescription['columnsByType'] = {};
  for (const column of template.columns) {
    columnsByType[column.type] = (columnsByType[column.type] ?? 0) + 1;
  }
  return {
    templateId: template.templateId,
    templateVersion: template.templateVersion,
    columnCount: template.columns.length,
    requiredCount: template.columns.filter((c) => c.required).length,
    columnsByType,
  };
}

import { telemetry } from '../../telemetry/Telemetry';
import { loadEmbeddedTemplate } from '../../template/TemplateLoader';
import type { SubmissionTemplate } from '../../template/SubmissionTemplate';

export type TemplateSource = 'embedded' | 'external';

export type ActiveTemplate = {
  template: SubmissionTemplate;
  source: TemplateSource;
};

let active: ActiveTemplate | null = null;

/**
 * Template used by API requests that do not bring their own.
 *
 * - Process-wide; resets on restart.
 * - Templates are frozen values, so a swap is a single reference assignment.
 */
export function getActiveTemplate(): ActiveTemplate {
  if (!active) {
    active = { template: loadEmbeddedTemplate(), source: 'embedded' };
  }
  return active;
}

/** Full replacement; nothing from the previous template carries over. */
export function setActiveTemplate(template: SubmissionTemplate): ActiveTemplate {
  active = { template, source: 'external' };
  telemetry.record({
    name: 'template.loaded',
    tags: {
      source: 'external',
      templateId: template.templateId,
      templateVersion: template.templateVersion,
    },
    metrics: { columns: template.columns.length },
  });
  return active;
}

export function resetActiveTemplate(): ActiveTemplate {
  active = null;
  return getActiveTemplate();
}

import { groupFindingsByCategory } from '../validation/findingCategories';
import type { ValidationFinding } from '../validation/ValidationFinding';
import { summarizeResult, type ValidationResult, type ValidationStatus } from '../validation/ValidationResult';

export type DashboardMeta = {
  fileName: string;
  /** ISO-8601 timestamp shown in the page header. */
  generatedAt: string;
};

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);

const STATUS_STYLE: Record<ValidationStatus, { color: string; label: string }> = {
  Failed: { color: '#e53e3e', label: 'Validation Failed' },
  Warning: { color: '#dd6b20', label: 'Warnings Found' },
  Passed: { color: '#48bb78', label: 'Validation Passed' },
};

const STYLES = `
  body { font-family: Arial, sans-serif; margin: 0; padding: 20px; background: #f5f5f5; }
  .container { max-width: 1000px; margin: 0 auto; }
  .panel { background: white; border: 1px solid #ddd; padding: 20px; margin-bottom: 20px; }
  .status-badge { display: inline-block; padding: 5px 10px; color: white; font-weight: bold; }
  .stats { display: flex; gap: 10px; margin-bottom: 20px; }
  .stat-card { flex: 1; background: white; border: 1px solid #ddd; padding: 15px; text-align: center; }
  .stat-card h3 { margin: 0 0 10px 0; color: #666; font-size: 12px; text-transform: uppercase; }
  .stat-card .value { font-size: 1.5em; font-weight: bold; color: #333; }
  .item { padding: 10px; margin-bottom: 10px; }
  .item.error { border-left: 3px solid #e53e3e; background: #fef5f5; }
  .item.warning { border-left: 3px solid #dd6b20; background: #fffaf0; }
  .meta { font-size: 11px; color: #999; margin-top: 5px; }
  ul.names { font-family: monospace; font-size: 12px; }
`;

const statCard = (title: string, value: string | number) =>
  `<div class="stat-card"><h3>${escapeHtml(title)}</h3><div class="value">${escapeHtml(String(value))}</div></div>`;

const nameList = (title: string, names: readonly string[]) => {
  if (names.length === 0) return '';
  const items = names.map((n) => `<li>${escapeHtml(JSON.stringify(n))}</li>`).join('');
  return `<h3>${escapeHtml(title)} (${names.length})</h3><ul class="names">${items}</ul>`;
};

const findingItem = (finding: ValidationFinding) => {
  const column = finding.column || '(row)';
  return [
    `<div class="item ${finding.severity}">`,
    `<h4>${escapeHtml(column)}</h4>`,
    `<p>${escapeHtml(finding.message)}</p>`,
    `<div class="meta">Row ${finding.row} | Value: &quot;${escapeHtml(finding.currentValue)}&quot; | ${finding.ruleId}</div>`,
    '</div>',
  ].join('');
};

const findingPanel = (title: string, findings: readonly ValidationFinding[]) => {
  if (findings.length === 0) return '';
  return `<div class="panel"><h2>${escapeHtml(title)} (${findings.length})</h2>${findings.map(findingItem).join('')}</div>`;
};

/**
 * Self-contained HTML page for one validation run.
 */
export function renderDashboardHtml(result: ValidationResult, meta: DashboardMeta): string {
  const summary = summarizeResult(result);
  const style = STATUS_STYLE[result.status];
  const categories = groupFindingsByCategory(result.errors);

  const categoryRows = categories
    .map(
      (g) =>
        `<tr><td>${escapeHtml(g.category)}</td><td>${g.count}</td><td>&quot;${escapeHtml(g.example)}&quot;</td><td>${escapeHtml(g.fix)}</td></tr>`,
    )
    .join('');

  const byKind = summary.subjectIdIssuesByKind;

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>Validation Results - ${escapeHtml(meta.fileName)}</title>
<style>${STYLES}</style>
</head>
<body>
<div class="container">
<div class="panel">
<h1>Validation Results</h1>
<p>File: ${escapeHtml(meta.fileName)} | Template: ${escapeHtml(result.templateId)} ${escapeHtml(result.templateVersion)} | Generated: ${escapeHtml(meta.generatedAt)}</p>
<span class="status-badge" style="background: ${style.color}">${style.label}</span>
</div>
<div class="stats">
${statCard('Total Rows', summary.totalRows)}
${statCard('Headers Match', result.headerDiff.missing.length === 0 ? 'Yes' : 'No')}
${statCard('Data Errors', summary.errorCount)}
${statCard('Warnings', summary.warningCount)}
${statCard('Subject ID Issues', summary.subjectIdIssueCount)}
</div>
<div class="panel">
<h2>Header Validation</h2>
<p>Headers must match the template exactly, including spelling, spacing and capitalization.</p>
${statCard('Matching Headers', result.headerDiff.matched.length)}
${nameList('Missing Headers', result.headerDiff.missing)}
${nameList('Extra Headers', result.headerDiff.extra)}
</div>
${categories.length > 0 ? `<div class="panel"><h2>Error Summary</h2><table><tr><th>Category</th><th>Count</th><th>Example</th><th>Fix</th></tr>${categoryRows}</table></div>` : ''}
${findingPanel('Data Validation Errors', result.errors)}
${findingPanel('Warnings', result.warnings)}
${
  result.subjectIdIssues.length > 0
    ? `<div class="panel"><h2>Subject ID Issues (${summary.subjectIdIssueCount})</h2><p>Unknown values: ${byKind.unknown} | Full names: ${byKind['full-name']} | Invalid format: ${byKind.invalid}</p></div>`
    : ''
}
</div>
</body>
</html>
`;
}

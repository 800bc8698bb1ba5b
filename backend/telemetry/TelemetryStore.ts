import type { ValidationStatus } from '../validation/ValidationResult';

export type TelemetryEvent = {
  ts: string;
  name: string;
  durationMs?: number;
  tags?: Record<string, string | number | boolean | null | undefined>;
  metrics?: Record<string, number | null | undefined>;
  message?: string;
};

type FindingTotals = {
  rows: number;
  errors: number;
  warnings: number;
  subjectIdIssues: number;
};

type TemplateActivity = {
  runs: number;
  failed: number;
  unprocessable: number;
  errors: number;
  warnings: number;
};

export type TelemetrySnapshot = {
  generatedAt: string;
  runs: {
    total: number;
    byStatus: Record<ValidationStatus, number>;
    unprocessable: number;
    avgMs: number;
    maxMs: number;
  };
  findings: FindingTotals;
  byTemplate: Array<{ templateId: string } & TemplateActivity>;
  templateLoads: number;
  batches: { count: number; files: number };
  apiErrors: Array<{ code: string; count: number }>;
  recentEvents: readonly TelemetryEvent[];
};

const compareStrings = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

const nowIso = () => new Date().toISOString();

const safeNumber = (value: unknown): number | null => {
  if (typeof value !== 'number') return null;
  if (!Number.isFinite(value)) return null;
  return value;
};

const metricOf = (e: TelemetryEvent, key: string) => safeNumber(e.metrics?.[key]) ?? 0;

const tagOf = (e: TelemetryEvent, key: string): string => {
  const v = e.tags?.[key];
  return v === null || v === undefined ? '' : String(v);
};

const asStatus = (value: string): ValidationStatus | null =>
  value === 'Passed' || value === 'Warning' || value === 'Failed' ? value : null;

const emptyFindings = (): FindingTotals => ({ rows: 0, errors: 0, warnings: 0, subjectIdIssues: 0 });

/**
 * Bounded buffer of recent events plus running totals of validation
 * activity: runs by status and template, finding counts, batch runs and
 * API failures.
 */
export class TelemetryStore {
  private readonly maxEvents: number;
  private readonly events: TelemetryEvent[] = [];

  private byStatus: Record<ValidationStatus, number> = { Passed: 0, Warning: 0, Failed: 0 };
  private unprocessable = 0;
  private runMs = { count: 0, sum: 0, max: 0 };
  private findings = emptyFindings();
  private readonly byTemplate = new Map<string, TemplateActivity>();
  private templateLoads = 0;
  private batches = { count: 0, files: 0 };
  private readonly apiErrors = new Map<string, number>();

  constructor(args?: { maxEvents?: number }) {
    this.maxEvents = Math.max(100, Math.trunc(args?.maxEvents ?? 2000));
  }

  reset(): void {
    this.events.length = 0;
    this.byStatus = { Passed: 0, Warning: 0, Failed: 0 };
    this.unprocessable = 0;
    this.runMs = { count: 0, sum: 0, max: 0 };
    this.findings = emptyFindings();
    this.byTemplate.clear();
    this.templateLoads = 0;
    this.batches = { count: 0, files: 0 };
    this.apiErrors.clear();
  }

  record(event: Omit<TelemetryEvent, 'ts'> & { ts?: string }): TelemetryEvent {
    const e: TelemetryEvent = { ...event, ts: event.ts ?? nowIso() };

    this.events.push(e);
    if (this.events.length > this.maxEvents)
      this.events.splice(0, this.events.length - this.maxEvents);

    switch (e.name) {
      case 'validation.run':
        this.countRun(e);
        break;
      case 'validation.unprocessable':
        this.unprocessable += 1;
        this.templateActivity(tagOf(e, 'template')).unprocessable += 1;
        break;
      case 'template.loaded':
        this.templateLoads += 1;
        break;
      case 'batch.completed':
        this.batches.count += 1;
        this.batches.files += metricOf(e, 'files');
        break;
      case 'api.error': {
        const code = tagOf(e, 'code');
        this.apiErrors.set(code, (this.apiErrors.get(code) ?? 0) + 1);
        break;
      }
      default:
        break;
    }

    return e;
  }

  private templateActivity(templateId: string): TemplateActivity {
    const existing = this.byTemplate.get(templateId);
    if (existing) return existing;
    const created: TemplateActivity = { runs: 0, failed: 0, unprocessable: 0, errors: 0, warnings: 0 };
    this.byTemplate.set(templateId, created);
    return created;
  }

  private countRun(e: TelemetryEvent): void {
    const status = asStatus(tagOf(e, 'status'));
    if (status) this.byStatus[status] += 1;

    const durationMs = safeNumber(e.durationMs);
    if (durationMs !== null) {
      this.runMs.count += 1;
      this.runMs.sum += durationMs;
      if (durationMs > this.runMs.max) this.runMs.max = durationMs;
    }

    const errors = metricOf(e, 'errors');
    const warnings = metricOf(e, 'warnings');
    this.findings.rows += metricOf(e, 'rows');
    this.findings.errors += errors;
    this.findings.warnings += warnings;
    this.findings.subjectIdIssues += metricOf(e, 'subjectIdIssues');

    const perTemplate = this.templateActivity(tagOf(e, 'template'));
    perTemplate.runs += 1;
    if (status === 'Failed') perTemplate.failed += 1;
    perTemplate.errors += errors;
    perTemplate.warnings += warnings;
  }

  listRecent(limit = 200): readonly TelemetryEvent[] {
    const n = Math.max(0, Math.trunc(limit));
    if (n === 0) return [];
    return this.events.slice(Math.max(0, this.events.length - n));
  }

  snapshot(): TelemetrySnapshot {
    const { Passed, Warning, Failed } = this.byStatus;
    return {
      generatedAt: nowIso(),
      runs: {
        total: Passed + Warning + Failed,
        byStatus: { ...this.byStatus },
        unprocessable: this.unprocessable,
        avgMs: this.runMs.count > 0 ? this.runMs.sum / this.runMs.count : 0,
        maxMs: this.runMs.max,
      },
      findings: { ...this.findings },
      byTemplate: Array.from(this.byTemplate.entries())
        .map(([templateId, activity]) => ({ templateId, ...activity }))
        .sort((a, b) => compareStrings(a.templateId, b.templateId)),
      templateLoads: this.templateLoads,
      batches: { ...this.batches },
      apiErrors: Array.from(this.apiErrors.entries())
        .map(([code, count]) => ({ code, count }))
        .sort((a, b) => compareStrings(a.code, b.code)),
      recentEvents: this.listRecent(200),
    };
  }
}

// Singleton for the running process.
export const telemetryStore = new TelemetryStore();

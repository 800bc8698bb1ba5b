import { telemetryStore, type TelemetryEvent } from './TelemetryStore';

const envFlag = (name: string): string => String(process.env[name] ?? '').trim();

const flagEnabled = (name: string): boolean => {
  const v = envFlag(name).toLowerCase();
  if (!v) return true;
  return v === '1' || v === 'true' || v === 'yes';
};

const nowMs = (): number => performance.now();

export const telemetry = {
  nowMs,

  /** Milliseconds elapsed since a `nowMs()` reading, rounded to 0.01 ms. */
  since(startMs: number): number {
    return Math.round((nowMs() - startMs) * 100) / 100;
  },

  record(event: Omit<TelemetryEvent, 'ts'> & { ts?: string }): void {
    if (!flagEnabled('VALIDATOR_TELEMETRY')) return;

    const stored = telemetryStore.record(event);

    if (flagEnabled('VALIDATOR_TELEMETRY_LOGS')) {
      // One JSON line per event.
      // eslint-disable-next-line no-console
      console.info(
        JSON.stringify({
          type: 'validator.telemetry',
          ts: stored.ts,
          name: stored.name,
          durationMs: stored.durationMs,
          tags: stored.tags,
          metrics: stored.metrics,
          message: stored.message,
        }),
      );
    }
  },
};

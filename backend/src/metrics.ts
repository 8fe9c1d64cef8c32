export const METRIC_NAMES = [
  "image_saved",
  "image_rejected",
  "analysis_completed",
  "analysis_failed",
  "ai_fallback_used",
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

type MetricsState = Record<MetricName, number>;

const buildEmptyCounts = (): MetricsState =>
  METRIC_NAMES.reduce((acc, name) => {
    acc[name] = 0;
    return acc;
  }, {} as MetricsState);

const totals = buildEmptyCounts();
let windowCounts = buildEmptyCounts();
const startedAt = new Date().toISOString();
let lastFlushAt = startedAt;
let flushTimer: ReturnType<typeof setInterval> | null = null;

export const incrementMetric = (name: MetricName, amount = 1): void => {
  totals[name] += amount;
  windowCounts[name] += amount;
};

export const getMetricsSnapshot = () => ({
  startedAt,
  lastFlushAt,
  totals: { ...totals },
  window: { ...windowCounts },
});

const formatCounts = (counts: MetricsState): string =>
  METRIC_NAMES.map((name) => `${name}=${counts[name]}`).join(" ");

export const startMetricsFlush = (): void => {
  if (flushTimer) return;

  flushTimer = setInterval(() => {
    const hasActivity = METRIC_NAMES.some((name) => windowCounts[name] > 0);
    if (hasActivity) {
      console.log(`[metrics] window ${formatCounts(windowCounts)}`);
    }
    windowCounts = buildEmptyCounts();
    lastFlushAt = new Date().toISOString();
  }, 60_000);
  flushTimer.unref();
};

export const stopMetricsFlush = (): void => {
  if (!flushTimer) return;
  clearInterval(flushTimer);
  flushTimer = null;
};

import {
  FieldValue,
  HEALTH_METRICS,
  METRICS,
  METRIC_ANCHORS,
  Metric,
  StoreRecord,
  TRAINING_METRICS,
} from "./shared/types";

export interface CategoryNeeds {
  health: boolean;
  trainingReadiness: boolean;
  gps: boolean;
}

const UNAVAILABLE_SEPARATOR = ";";

function isMetric(value: string): value is Metric {
  return METRICS.some((metric) => metric === value);
}

/**
 * A field counts as present unless it is missing, null, blank or NaN.
 * 0 and false are real readings.
 */
export function hasValue(value: FieldValue): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === "string") return value.trim() !== "";
  if (typeof value === "number") return !Number.isNaN(value);
  return true;
}

/**
 * Metrics the provider has confirmed it has no data for
 */
export function unavailableMetrics(record: StoreRecord): Set<Metric> {
  const raw = record.unavailableMetrics;
  const metrics = new Set<Metric>();
  if (typeof raw !== "string") return metrics;

  for (const part of raw.split(UNAVAILABLE_SEPARATOR)) {
    const name = part.trim();
    if (isMetric(name)) metrics.add(name);
  }
  return metrics;
}

export function formatUnavailableMetrics(metrics: Set<Metric>): string {
  return METRICS.filter((metric) => metrics.has(metric)).join(UNAVAILABLE_SEPARATOR);
}

/**
 * A metric is settled once its anchor field holds a value or the provider
 * has reported it unavailable.
 */
export function isMetricSettled(record: StoreRecord, metric: Metric): boolean {
  if (hasValue(record[METRIC_ANCHORS[metric]])) return true;
  return unavailableMetrics(record).has(metric);
}

/**
 * Health is complete once every health metric has been fetched or confirmed
 * unavailable.
 */
export function needsHealth(record: StoreRecord): boolean {
  return !HEALTH_METRICS.every((metric) => isMetricSettled(record, metric));
}

export function needsTrainingReadiness(record: StoreRecord): boolean {
  if (hasValue(record.trainingReadinessScore) || hasValue(record.trainingStatus)) {
    return false;
  }
  const unavailable = unavailableMetrics(record);
  return !TRAINING_METRICS.every((metric) => unavailable.has(metric));
}

/**
 * @param trackUpstream - whether the remote listing reports a GPS track
 */
export function needsGps(record: StoreRecord, trackUpstream: boolean): boolean {
  return trackUpstream && !hasValue(record.gpsTrackFile);
}

export function classifyNeeds(record: StoreRecord, trackUpstream: boolean): CategoryNeeds {
  return {
    health: needsHealth(record),
    trainingReadiness: needsTrainingReadiness(record),
    gps: needsGps(record, trackUpstream),
  };
}

export function needsAny(needs: CategoryNeeds): boolean {
  return needs.health || needs.trainingReadiness || needs.gps;
}

/**
 * Date-scoped metrics still to fetch for the categories that are needed
 */
export function metricsToFetch(record: StoreRecord, needs: CategoryNeeds): Metric[] {
  const metrics: Metric[] = [];
  if (needs.health) {
    metrics.push(...HEALTH_METRICS.filter((metric) => !isMetricSettled(record, metric)));
  }
  if (needs.trainingReadiness) {
    metrics.push(...TRAINING_METRICS.filter((metric) => !isMetricSettled(record, metric)));
  }
  return metrics;
}

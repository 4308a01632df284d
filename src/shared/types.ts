// A single CSV cell before serialization
export type FieldValue = string | number | boolean | null | undefined;

// Any persisted row: activities and daily health records share this shape
export interface StoreRecord {
  [field: string]: FieldValue;
}

export type KeyField = "activityId" | "date";

export const SLEEP_FIELDS = [
  "sleepDuration",        // hours
  "sleepDeepDuration",
  "sleepLightDuration",
  "sleepRemDuration",
  "sleepAwakeDuration",
  "sleepQuality",
] as const;

export const STRESS_FIELDS = [
  "stressAvg",
  "stressMax",
  "stressRestDuration",   // seconds
  "stressLowDuration",
  "stressMediumDuration",
  "stressHighDuration",
] as const;

export const BODY_BATTERY_FIELDS = [
  "bodyBatteryAvg",
  "bodyBatteryMax",
  "bodyBatteryMin",
] as const;

export const TRAINING_FIELDS = [
  "trainingReadinessScore",
  "trainingReadiness",
  "trainingStatus",
  "trainingStatusText",
] as const;

export const ENRICHMENT_FIELDS = [
  ...SLEEP_FIELDS,
  ...STRESS_FIELDS,
  ...BODY_BATTERY_FIELDS,
  "restingHeartRate",
  "dailySteps",
  ...TRAINING_FIELDS,
  "gpsTrackFile",
  "unavailableMetrics",
] as const;

export type SleepField = (typeof SLEEP_FIELDS)[number];
export type StressField = (typeof STRESS_FIELDS)[number];
export type BodyBatteryField = (typeof BODY_BATTERY_FIELDS)[number];
export type EnrichmentField = (typeof ENRICHMENT_FIELDS)[number];

export type SleepMetrics = Partial<Record<SleepField, number>>;
export type StressMetrics = Partial<Record<StressField, number>>;
export type BodyBatteryMetrics = Partial<Record<BodyBatteryField, number>>;

export type RestingHeartRateMetrics = {
  restingHeartRate?: number;
};

export type DailyStepsMetrics = {
  dailySteps?: number;
};

export type TrainingReadinessMetrics = {
  trainingReadinessScore?: number;
  trainingReadiness?: string;
};

export type TrainingStatusMetrics = {
  trainingStatus?: number | string;
  trainingStatusText?: string;
};

/**
 * Metrics fetched one date at a time. Each is fetched, cached and marked
 * unavailable independently of the others.
 */
export const METRICS = [
  "sleep",
  "stress",
  "bodyBattery",
  "restingHeartRate",
  "dailySteps",
  "trainingReadiness",
  "trainingStatus",
] as const;

export type Metric = (typeof METRICS)[number];

export const HEALTH_METRICS: readonly Metric[] = [
  "sleep",
  "stress",
  "bodyBattery",
  "restingHeartRate",
  "dailySteps",
];

export const TRAINING_METRICS: readonly Metric[] = [
  "trainingReadiness",
  "trainingStatus",
];

// Field whose presence means the metric has been fetched successfully
export const METRIC_ANCHORS: Record<Metric, EnrichmentField> = {
  sleep: "sleepDuration",
  stress: "stressAvg",
  bodyBattery: "bodyBatteryMax",
  restingHeartRate: "restingHeartRate",
  dailySteps: "dailySteps",
  trainingReadiness: "trainingReadinessScore",
  trainingStatus: "trainingStatus",
};

export interface ActivityRecord extends StoreRecord {
  activityId: string;
  startTimeLocal?: string;
  activityName?: string;
  activityType?: string;
  duration?: number;          // seconds
  distance?: number;          // meters
  calories?: number;
  averageHR?: number;
  maxHR?: number;
  hasPolyline?: boolean;
  gpsTrackFile?: string;      // relative path or GPS_TRACK_UNAVAILABLE
}

export interface DailyHealthRecord extends StoreRecord {
  date: string;               // YYYY-MM-DD
}

// Written to gpsTrackFile once the provider confirms there is no track
export const GPS_TRACK_UNAVAILABLE = "unavailable";

export type TrackFormat = "gpx" | "tcx";

export interface TrackDownload {
  format: TrackFormat;
  data: Buffer;
}

/**
 * Outcome of fetching one enrichment metric. "unavailable" means the
 * provider answered without data; "error" means the fetch itself failed
 * and should be retried on a later run.
 */
export type CategoryResult<T> =
  | { status: "ok"; value: T }
  | { status: "unavailable" }
  | { status: "error"; error: Error };

export type ReconcileStatus = "new" | "update" | "unchanged";

export interface ReconcileCounts {
  new: number;
  updated: number;
  unchanged: number;
  retained: number;           // local-only records carried through
}

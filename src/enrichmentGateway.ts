import { GarminClient } from "./shared/garminClient";
import {
  BODY_BATTERY_PATH,
  RESTING_HEART_RATE_METRIC_ID,
  dailyStepsPath,
  downloadPath,
  restingHeartRatePath,
  sleepPath,
  stressPath,
  trainingReadinessPath,
  trainingStatusPath,
} from "./shared/endpoints";
import { isAuthenticationError, toError } from "./shared/errors";
import { setupLogger } from "./shared/logger";
import {
  JsonObject,
  firstRecord,
  isRecord,
  lastRecord,
  numberAt,
  recordAt,
  stringAt,
} from "./shared/payload";
import {
  BodyBatteryMetrics,
  CategoryResult,
  DailyStepsMetrics,
  RestingHeartRateMetrics,
  SleepMetrics,
  StressMetrics,
  TrackDownload,
  TrackFormat,
  TrainingReadinessMetrics,
  TrainingStatusMetrics,
} from "./shared/types";

const logger = setupLogger("enrichment-gateway");

export const DEFAULT_TRACK_FORMATS: readonly TrackFormat[] = ["gpx", "tcx"];

/**
 * Per-metric access to the remote account. Every operation is independent:
 * a failure is reported as an "error" result for that metric only.
 */
export interface EnrichmentGateway {
  fetchSleep(date: string): Promise<CategoryResult<SleepMetrics>>;
  fetchStress(date: string): Promise<CategoryResult<StressMetrics>>;
  fetchBodyBattery(date: string): Promise<CategoryResult<BodyBatteryMetrics>>;
  fetchRestingHeartRate(date: string): Promise<CategoryResult<RestingHeartRateMetrics>>;
  fetchDailySteps(date: string): Promise<CategoryResult<DailyStepsMetrics>>;
  fetchTrainingReadiness(date: string): Promise<CategoryResult<TrainingReadinessMetrics>>;
  fetchTrainingStatus(date: string): Promise<CategoryResult<TrainingStatusMetrics>>;
  downloadTrack(
    activityId: string,
    formats?: readonly TrackFormat[]
  ): Promise<CategoryResult<TrackDownload>>;
}

const secondsToHours = (seconds: number | undefined): number | undefined =>
  seconds === undefined ? undefined : seconds / 3600;

/**
 * Sleep summary from either the current (dailySleepDTO) or legacy (sleep)
 * response shape. Durations are converted to hours.
 */
export function parseSleep(payload: unknown): SleepMetrics | undefined {
  const root = isRecord(payload) ? payload : undefined;
  const sleep = recordAt(root, "dailySleepDTO") ?? recordAt(root, "sleep");
  const sleepSeconds = numberAt(sleep, "sleepTimeSeconds");
  if (!sleepSeconds) return undefined;

  const overall = recordAt(recordAt(sleep, "sleepScores"), "overall");
  return {
    sleepDuration: secondsToHours(sleepSeconds),
    sleepDeepDuration: secondsToHours(numberAt(sleep, "deepSleepSeconds")),
    sleepLightDuration: secondsToHours(numberAt(sleep, "lightSleepSeconds")),
    sleepRemDuration: secondsToHours(numberAt(sleep, "remSleepSeconds")),
    sleepAwakeDuration: secondsToHours(numberAt(sleep, "awakeSleepSeconds")),
    sleepQuality:
      numberAt(overall, "value") ??
      numberAt(sleep, "sleepQualityScore") ??
      numberAt(sleep, "sleepQuality"),
  };
}

export function parseStress(payload: unknown): StressMetrics | undefined {
  const stress = firstRecord(payload);
  const stressAvg = numberAt(stress, "avgStressLevel") ?? numberAt(stress, "averageStressLevel");
  if (stressAvg === undefined) return undefined;

  return {
    stressAvg,
    stressMax: numberAt(stress, "maxStressLevel"),
    stressRestDuration: numberAt(stress, "restStressDuration"),
    stressLowDuration: numberAt(stress, "lowStressDuration"),
    stressMediumDuration: numberAt(stress, "mediumStressDuration"),
    stressHighDuration: numberAt(stress, "highStressDuration"),
  };
}

/**
 * Body battery summary values, or max/min/mean of the sampled values
 * when the summary is missing
 */
export function parseBodyBattery(payload: unknown): BodyBatteryMetrics | undefined {
  const report = firstRecord(payload);
  const summary: BodyBatteryMetrics = {
    bodyBatteryAvg: numberAt(report, "averageBodyBattery"),
    bodyBatteryMax: numberAt(report, "maxBodyBattery"),
    bodyBatteryMin: numberAt(report, "minBodyBattery"),
  };
  if (summary.bodyBatteryMax !== undefined) return summary;

  const samples = report?.bodyBatteryValuesArray;
  if (!Array.isArray(samples)) return undefined;

  const values: number[] = [];
  for (const sample of samples) {
    if (Array.isArray(sample) && typeof sample[1] === "number") {
      values.push(sample[1]);
    }
  }
  if (values.length === 0) return undefined;

  return {
    bodyBatteryAvg: values.reduce((sum, value) => sum + value, 0) / values.length,
    bodyBatteryMax: Math.max(...values),
    bodyBatteryMin: Math.min(...values),
  };
}

export function parseRestingHeartRate(payload: unknown): RestingHeartRateMetrics | undefined {
  const root = isRecord(payload) ? payload : undefined;
  const metricsMap = recordAt(recordAt(root, "allMetrics"), "metricsMap");
  const series = metricsMap?.WELLNESS_RESTING_HEART_RATE;

  const restingHeartRate = Array.isArray(series)
    ? numberAt(firstRecord(series), "value")
    : numberAt(root, "value");
  return restingHeartRate === undefined ? undefined : { restingHeartRate };
}

export function parseDailySteps(payload: unknown): DailyStepsMetrics | undefined {
  const dailySteps = numberAt(lastRecord(payload), "totalSteps");
  return dailySteps === undefined ? undefined : { dailySteps };
}

export function parseTrainingReadiness(payload: unknown): TrainingReadinessMetrics | undefined {
  const readiness = firstRecord(payload);
  const trainingReadinessScore = numberAt(readiness, "score");
  if (trainingReadinessScore === undefined) return undefined;

  return {
    trainingReadinessScore,
    trainingReadiness: stringAt(readiness, "level"),
  };
}

/**
 * Training status from a flat { status, statusText } answer, or from the
 * first device of the aggregated status report
 */
export function parseTrainingStatus(payload: unknown): TrainingStatusMetrics | undefined {
  const root = firstRecord(payload);
  const flatStatus = numberAt(root, "status") ?? stringAt(root, "status");
  if (flatStatus !== undefined) {
    return { trainingStatus: flatStatus, trainingStatusText: stringAt(root, "statusText") };
  }

  const latest = recordAt(recordAt(root, "mostRecentTrainingStatus"), "latestTrainingStatusData");
  const device: JsonObject | undefined = latest ? Object.values(latest).find(isRecord) : undefined;
  const trainingStatus = numberAt(device, "trainingStatus");
  if (trainingStatus === undefined) return undefined;

  return {
    trainingStatus,
    trainingStatusText: stringAt(device, "trainingStatusFeedbackPhrase"),
  };
}

/**
 * Enrichment gateway backed by an authenticated Garmin Connect session
 */
export class GarminEnrichmentGateway implements EnrichmentGateway {
  private garminClient: GarminClient;

  constructor(garminClient: GarminClient) {
    this.garminClient = garminClient;
  }

  /**
   * Run one request and classify the outcome. Authentication problems are
   * not a per-metric failure and propagate.
   */
  private async fetchCategory<T>(
    label: string,
    date: string,
    request: () => Promise<unknown>,
    parse: (payload: unknown) => T | undefined
  ): Promise<CategoryResult<T>> {
    try {
      const value = parse(await request());
      if (value === undefined) {
        logger.debug(`No ${label} data for ${date}`);
        return { status: "unavailable" };
      }
      return { status: "ok", value };
    } catch (error: unknown) {
      if (isAuthenticationError(error)) throw error;
      const failure = toError(error);
      logger.debug(`Could not fetch ${label} for ${date}: ${failure.message}`);
      return { status: "error", error: failure };
    }
  }

  fetchSleep(date: string): Promise<CategoryResult<SleepMetrics>> {
    return this.fetchCategory(
      "sleep",
      date,
      () =>
        this.garminClient.getJson(sleepPath(this.garminClient.getDisplayName()), {
          date,
          nonSleepBufferMinutes: 60,
        }),
      parseSleep
    );
  }

  fetchStress(date: string): Promise<CategoryResult<StressMetrics>> {
    return this.fetchCategory(
      "stress",
      date,
      () => this.garminClient.getJson(stressPath(date)),
      parseStress
    );
  }

  fetchBodyBattery(date: string): Promise<CategoryResult<BodyBatteryMetrics>> {
    return this.fetchCategory(
      "body battery",
      date,
      () => this.garminClient.getJson(BODY_BATTERY_PATH, { startDate: date, endDate: date }),
      parseBodyBattery
    );
  }

  fetchRestingHeartRate(date: string): Promise<CategoryResult<RestingHeartRateMetrics>> {
    return this.fetchCategory(
      "resting heart rate",
      date,
      () =>
        this.garminClient.getJson(restingHeartRatePath(this.garminClient.getDisplayName()), {
          fromDate: date,
          untilDate: date,
          metricId: RESTING_HEART_RATE_METRIC_ID,
        }),
      parseRestingHeartRate
    );
  }

  fetchDailySteps(date: string): Promise<CategoryResult<DailyStepsMetrics>> {
    return this.fetchCategory(
      "daily steps",
      date,
      () => this.garminClient.getJson(dailyStepsPath(date, date)),
      parseDailySteps
    );
  }

  fetchTrainingReadiness(date: string): Promise<CategoryResult<TrainingReadinessMetrics>> {
    return this.fetchCategory(
      "training readiness",
      date,
      () => this.garminClient.getJson(trainingReadinessPath(date)),
      parseTrainingReadiness
    );
  }

  fetchTrainingStatus(date: string): Promise<CategoryResult<TrainingStatusMetrics>> {
    return this.fetchCategory(
      "training status",
      date,
      () => this.garminClient.getJson(trainingStatusPath(date)),
      parseTrainingStatus
    );
  }

  /**
   * Try each export format in order. The first non-empty payload wins; if
   * every format answers empty the track is unavailable, and if none
   * succeeded but one failed the download is retried on a later run.
   */
  async downloadTrack(
    activityId: string,
    formats: readonly TrackFormat[] = DEFAULT_TRACK_FORMATS
  ): Promise<CategoryResult<TrackDownload>> {
    let lastError: Error | undefined;

    for (const format of formats) {
      try {
        const data = await this.garminClient.download(downloadPath(format, activityId));
        if (data.length > 0) {
          return { status: "ok", value: { format, data } };
        }
        logger.debug(`Empty ${format} export for activity ${activityId}`);
      } catch (error: unknown) {
        if (isAuthenticationError(error)) throw error;
        lastError = toError(error);
        logger.debug(`Could not download ${format} track for activity ${activityId}: ${lastError.message}`);
      }
    }

    return lastError ? { status: "error", error: lastError } : { status: "unavailable" };
  }
}

export default GarminEnrichmentGateway;

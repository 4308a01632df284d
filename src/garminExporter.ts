import { EnrichmentGateway, GarminEnrichmentGateway } from "./enrichmentGateway";
import { GpsTrackWriter } from "./gpsTrackWriter";
import { ACTIVITY_KIND, DAILY_KIND, ReconcileResult, ReconciliationEngine } from "./reconciler";
import { TabularStore } from "./tabularStore";
import { eachDateInRange } from "./shared/dates";
import { AuthenticationError } from "./shared/errors";
import { GarminClient, RawActivity } from "./shared/garminClient";
import { setupLogger } from "./shared/logger";
import { isRecord, stringAt } from "./shared/payload";
import {
  ActivityRecord,
  DailyHealthRecord,
  FieldValue,
  ReconcileCounts,
} from "./shared/types";

const logger = setupLogger("garmin-exporter");

export interface ActivityExportOptions {
  outputPath: string;
  gpsTracksDir: string;
  startDate: string;
  endDate: string;
}

export interface DailyExportOptions {
  outputPath: string;
  startDate: string;
  endDate: string;
}

export interface CombinedExportOptions {
  activities: ActivityExportOptions;
  daily: DailyExportOptions;
}

export interface ExportSummary {
  total: number;
  counts: ReconcileCounts;
  fetchFailures: number;
  fallbacks: number;
  outputPath: string;
}

export interface CombinedExportSummary {
  activities: ExportSummary;
  daily: ExportSummary;
}

function toSummary(result: ReconcileResult, outputPath: string): ExportSummary {
  return {
    total: result.records.length,
    counts: result.counts,
    fetchFailures: result.fetchFailures,
    fallbacks: result.fallbacks,
    outputPath,
  };
}

function isFieldValue(value: unknown): value is FieldValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

/**
 * Flatten one activity summary into a table row. Scalar fields are kept,
 * typed objects such as activityType collapse to their typeKey and any
 * other nested value is dropped.
 */
export function toActivityRecord(raw: RawActivity): ActivityRecord {
  const activityId = raw.activityId;
  const record: ActivityRecord = {
    activityId:
      typeof activityId === "number" || typeof activityId === "string" ? String(activityId) : "",
  };

  for (const [field, value] of Object.entries(raw)) {
    if (field === "activityId") continue;
    if (isFieldValue(value)) {
      record[field] = value;
    } else if (isRecord(value)) {
      const typeKey = stringAt(value, "typeKey");
      if (typeKey !== undefined) record[field] = typeKey;
    }
  }

  return record;
}

/**
 * Incremental export of activities and daily health into CSV stores
 */
export class GarminExporter {
  private garminClient: GarminClient;
  private gateway: EnrichmentGateway;

  constructor(garminClient: GarminClient, gateway?: EnrichmentGateway) {
    this.garminClient = garminClient;
    this.gateway = gateway ?? new GarminEnrichmentGateway(garminClient);
  }

  /**
   * Authenticate, run the work and always release the session
   */
  private async withSession<T>(work: () => Promise<T>): Promise<T> {
    const authenticated = await this.garminClient.authenticate();
    if (!authenticated) {
      throw new AuthenticationError();
    }

    try {
      return await work();
    } finally {
      this.garminClient.release();
    }
  }

  async exportActivities(options: ActivityExportOptions): Promise<ExportSummary> {
    // Validate the range before touching the network
    eachDateInRange(options.startDate, options.endDate);
    return this.withSession(() => this.syncActivities(options));
  }

  async exportDailyHealth(options: DailyExportOptions): Promise<ExportSummary> {
    const dates = eachDateInRange(options.startDate, options.endDate);
    return this.withSession(() => this.syncDailyHealth(options, dates));
  }

  /**
   * Run both exports inside a single session
   */
  async exportAll(options: CombinedExportOptions): Promise<CombinedExportSummary> {
    eachDateInRange(options.activities.startDate, options.activities.endDate);
    const dates = eachDateInRange(options.daily.startDate, options.daily.endDate);

    return this.withSession(async () => ({
      activities: await this.syncActivities(options.activities),
      daily: await this.syncDailyHealth(options.daily, dates),
    }));
  }

  private async syncActivities(options: ActivityExportOptions): Promise<ExportSummary> {
    const store = new TabularStore(options.outputPath, ACTIVITY_KIND.keyField);
    const local = store.load();
    const remote = (
      await this.garminClient.listActivities(options.startDate, options.endDate)
    ).map(toActivityRecord);

    const engine = new ReconciliationEngine(this.gateway, {
      trackWriter: new GpsTrackWriter(options.gpsTracksDir, options.outputPath),
    });
    const result = await engine.reconcile(remote, local, ACTIVITY_KIND);
    store.save(result.records);

    logger.info(
      `✅ Activities: ${result.counts.new} new, ${result.counts.updated} updated, ${result.counts.unchanged} unchanged, ${result.counts.retained} retained`
    );
    return toSummary(result, options.outputPath);
  }

  private async syncDailyHealth(options: DailyExportOptions, dates: string[]): Promise<ExportSummary> {
    const store = new TabularStore(options.outputPath, DAILY_KIND.keyField);
    const local = store.load();
    const remote: DailyHealthRecord[] = dates.map((date) => ({ date }));
    logger.info(`📅 Checking ${dates.length} days from ${options.startDate} to ${options.endDate}...`);

    const engine = new ReconciliationEngine(this.gateway);
    const result = await engine.reconcile(remote, local, DAILY_KIND);
    store.save(result.records);

    logger.info(
      `✅ Daily health: ${result.counts.new} new, ${result.counts.updated} updated, ${result.counts.unchanged} unchanged, ${result.counts.retained} retained`
    );
    return toSummary(result, options.outputPath);
  }
}

export default GarminExporter;

import {
  CategoryNeeds,
  classifyNeeds,
  formatUnavailableMetrics,
  metricsToFetch,
  needsAny,
  unavailableMetrics,
} from "./completeness";
import { DEFAULT_TRACK_FORMATS, EnrichmentGateway } from "./enrichmentGateway";
import { GpsTrackWriter } from "./gpsTrackWriter";
import { mergeRecords } from "./recordMerger";
import { toLookupDate } from "./shared/dates";
import { isAuthenticationError, toError } from "./shared/errors";
import { setupLogger } from "./shared/logger";
import {
  CategoryResult,
  GPS_TRACK_UNAVAILABLE,
  KeyField,
  Metric,
  ReconcileCounts,
  ReconcileStatus,
  StoreRecord,
  TrackFormat,
} from "./shared/types";

const logger = setupLogger("reconciler");

/**
 * What the engine needs to know about one kind of record
 */
export interface RecordKind {
  label: string;
  keyField: KeyField;
  lookupDate: (record: StoreRecord) => string | null;
  hasTrackUpstream: (record: StoreRecord) => boolean;
  sortByKey: boolean;
  progressInterval: number;
}

export const ACTIVITY_KIND: RecordKind = {
  label: "activity",
  keyField: "activityId",
  lookupDate: (record) => toLookupDate(record.startTimeLocal),
  hasTrackUpstream: (record) => record.hasPolyline === true || record.hasPolyline === "true",
  sortByKey: false,
  progressInterval: 5,
};

export const DAILY_KIND: RecordKind = {
  label: "day",
  keyField: "date",
  lookupDate: (record) => toLookupDate(record.date),
  hasTrackUpstream: () => false,
  sortByKey: true,
  progressInterval: 10,
};

export interface PlanItem {
  key: string;
  status: ReconcileStatus;
  remote: StoreRecord;
  existing: StoreRecord | null;
  needs: CategoryNeeds;
}

export interface ReconcilePlan {
  items: PlanItem[];
  retained: StoreRecord[];
  counts: ReconcileCounts;
}

export interface ReconcileResult {
  records: StoreRecord[];
  counts: ReconcileCounts;
  fetchFailures: number;
  fallbacks: number;
}

export interface ReconciliationEngineOptions {
  trackWriter?: GpsTrackWriter;
  trackFormats?: readonly TrackFormat[];
}

export function recordKey(record: StoreRecord, keyField: KeyField): string {
  const value = record[keyField];
  if (value === undefined || value === null) return "";
  return String(value).trim();
}

/**
 * Classify every remote record against the local store without fetching
 * anything. Later duplicates of a remote key are ignored; local records the
 * remote listing does not mention, including rows without a key, are
 * retained as they are.
 */
export function planReconciliation(
  remote: StoreRecord[],
  local: StoreRecord[],
  kind: RecordKind
): ReconcilePlan {
  const localIndex = new Map<string, StoreRecord>();
  const unkeyed: StoreRecord[] = [];
  for (const record of local) {
    const key = recordKey(record, kind.keyField);
    if (!key) {
      logger.warn(`Local record without ${kind.keyField}, keeping it as is`);
      unkeyed.push(record);
      continue;
    }
    if (localIndex.has(key)) {
      logger.warn(`Duplicate ${kind.keyField} ${key} in local store, keeping the last row`);
    }
    localIndex.set(key, record);
  }

  const items: PlanItem[] = [];
  const seen = new Set<string>();
  const counts: ReconcileCounts = { new: 0, updated: 0, unchanged: 0, retained: 0 };

  for (const remoteRecord of remote) {
    const key = recordKey(remoteRecord, kind.keyField);
    if (!key) {
      logger.warn(`Skipping remote ${kind.label} without ${kind.keyField}`);
      continue;
    }
    if (seen.has(key)) {
      logger.debug(`Remote ${kind.label} ${key} listed twice, keeping the first`);
      continue;
    }
    seen.add(key);

    const trackUpstream = kind.hasTrackUpstream(remoteRecord);
    const existing = localIndex.get(key) ?? null;

    if (!existing) {
      counts.new++;
      items.push({
        key,
        status: "new",
        remote: remoteRecord,
        existing: null,
        needs: classifyNeeds({}, trackUpstream),
      });
      continue;
    }

    const needs = classifyNeeds(existing, trackUpstream);
    const status: ReconcileStatus = needsAny(needs) ? "update" : "unchanged";
    if (status === "update") {
      counts.updated++;
    } else {
      counts.unchanged++;
    }
    items.push({ key, status, remote: remoteRecord, existing, needs });
  }

  const retained: StoreRecord[] = [];
  for (const [key, record] of localIndex) {
    if (!seen.has(key)) retained.push(record);
  }
  retained.push(...unkeyed);
  counts.retained = retained.length;

  return { items, retained, counts };
}

function assignValues(target: StoreRecord, values: StoreRecord): void {
  for (const [field, value] of Object.entries(values)) {
    if (value !== undefined) {
      target[field] = value;
    }
  }
}

interface RunState {
  // metric results by "metric:date", shared by every record of one run
  cache: Map<string, CategoryResult<StoreRecord>>;
  fetchFailures: number;
}

/**
 * Brings a local store up to date with a remote listing, fetching only the
 * metrics each record is missing. Records are processed strictly one at a
 * time because the gateway shares one authenticated session.
 */
export class ReconciliationEngine {
  private gateway: EnrichmentGateway;
  private trackWriter?: GpsTrackWriter;
  private trackFormats: readonly TrackFormat[];

  constructor(gateway: EnrichmentGateway, options: ReconciliationEngineOptions = {}) {
    this.gateway = gateway;
    this.trackWriter = options.trackWriter;
    this.trackFormats = options.trackFormats ?? DEFAULT_TRACK_FORMATS;
  }

  async reconcile(
    remote: StoreRecord[],
    local: StoreRecord[],
    kind: RecordKind
  ): Promise<ReconcileResult> {
    const plan = planReconciliation(remote, local, kind);
    const { counts } = plan;

    const unchanged: StoreRecord[] = [];
    const pending: PlanItem[] = [];
    for (const item of plan.items) {
      if (item.status === "unchanged") {
        unchanged.push(item.existing ?? item.remote);
      } else {
        pending.push(item);
      }
    }

    logger.info(
      `Processing ${pending.length} ${kind.label} records (${counts.new} new, ${counts.updated} updates, ${counts.unchanged} unchanged)...`
    );

    const state: RunState = { cache: new Map(), fetchFailures: 0 };
    const processed: StoreRecord[] = [];
    let fallbacks = 0;

    for (const [index, item] of pending.entries()) {
      try {
        processed.push(await this.enrich(item, kind, state));
      } catch (error: unknown) {
        if (isAuthenticationError(error)) throw error;
        logger.error(`❌ Error processing ${kind.label} ${item.key}: ${toError(error).message}`);
        processed.push(item.existing ?? item.remote);
        fallbacks++;
      }

      const completed = index + 1;
      if (completed % kind.progressInterval === 0) {
        logger.info(`Processed ${completed}/${pending.length} ${kind.label} records...`);
      }
    }

    const records = [...unchanged, ...plan.retained, ...processed];
    if (kind.sortByKey) {
      records.sort((a, b) => {
        const left = recordKey(a, kind.keyField);
        const right = recordKey(b, kind.keyField);
        return left < right ? -1 : left > right ? 1 : 0;
      });
    }

    return { records, counts, fetchFailures: state.fetchFailures, fallbacks };
  }

  /**
   * Fetch the missing metrics of one record and merge them over its
   * previous version
   */
  private async enrich(item: PlanItem, kind: RecordKind, state: RunState): Promise<StoreRecord> {
    const previous = item.existing ?? {};
    const fresh: StoreRecord = { ...item.remote };
    const unavailable = unavailableMetrics(previous);
    const metrics = metricsToFetch(previous, item.needs);
    const date = kind.lookupDate(item.remote);

    if (date === null && metrics.length > 0) {
      logger.debug(`No usable date for ${kind.label} ${item.key}, skipping daily metrics`);
    }

    if (date !== null) {
      for (const metric of metrics) {
        const result = await this.fetchMetric(metric, date, state);
        if (result.status === "ok") {
          assignValues(fresh, result.value);
        } else if (result.status === "unavailable") {
          unavailable.add(metric);
        } else {
          state.fetchFailures++;
        }
      }
    }

    if (unavailable.size > 0) {
      fresh.unavailableMetrics = formatUnavailableMetrics(unavailable);
    }

    if (item.needs.gps) {
      await this.attachTrack(item.key, fresh, state);
    }

    return mergeRecords(fresh, previous);
  }

  private async attachTrack(activityId: string, fresh: StoreRecord, state: RunState): Promise<void> {
    if (!this.trackWriter) {
      logger.debug(`No track directory configured, skipping track for ${activityId}`);
      return;
    }

    const result = await this.settle(() => this.gateway.downloadTrack(activityId, this.trackFormats));
    if (result.status === "unavailable") {
      fresh.gpsTrackFile = GPS_TRACK_UNAVAILABLE;
      return;
    }
    if (result.status === "error") {
      state.fetchFailures++;
      return;
    }

    // A track that cannot be stored is retried next run like a failed download
    try {
      fresh.gpsTrackFile = this.trackWriter.write(activityId, result.value);
    } catch (error: unknown) {
      logger.warn(`Could not store track for activity ${activityId}: ${toError(error).message}`);
      state.fetchFailures++;
    }
  }

  /**
   * At most one request per metric and date per run, whatever the outcome
   */
  private async fetchMetric(
    metric: Metric,
    date: string,
    state: RunState
  ): Promise<CategoryResult<StoreRecord>> {
    const cacheKey = `${metric}:${date}`;
    const cached = state.cache.get(cacheKey);
    if (cached) return cached;

    const result = await this.settle(() => this.requestMetric(metric, date));
    state.cache.set(cacheKey, result);
    return result;
  }

  private requestMetric(metric: Metric, date: string): Promise<CategoryResult<StoreRecord>> {
    switch (metric) {
      case "sleep":
        return this.gateway.fetchSleep(date);
      case "stress":
        return this.gateway.fetchStress(date);
      case "bodyBattery":
        return this.gateway.fetchBodyBattery(date);
      case "restingHeartRate":
        return this.gateway.fetchRestingHeartRate(date);
      case "dailySteps":
        return this.gateway.fetchDailySteps(date);
      case "trainingReadiness":
        return this.gateway.fetchTrainingReadiness(date);
      case "trainingStatus":
        return this.gateway.fetchTrainingStatus(date);
    }
  }

  /**
   * Treat a gateway that throws like one that reported an error
   */
  private async settle<T>(request: () => Promise<CategoryResult<T>>): Promise<CategoryResult<T>> {
    try {
      return await request();
    } catch (error: unknown) {
      if (isAuthenticationError(error)) throw error;
      return { status: "error", error: toError(error) };
    }
  }
}

export default ReconciliationEngine;

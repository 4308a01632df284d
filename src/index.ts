import GarminExporter from "./garminExporter";
import ReconciliationEngine from "./reconciler";
import TabularStore from "./tabularStore";
import { GarminClient } from "./shared/garminClient";

export { GarminExporter, ReconciliationEngine, TabularStore, GarminClient };
export { ACTIVITY_KIND, DAILY_KIND, planReconciliation, recordKey } from "./reconciler";
export type { RecordKind, ReconcileResult } from "./reconciler";
export { GarminEnrichmentGateway } from "./enrichmentGateway";
export type { EnrichmentGateway } from "./enrichmentGateway";
export { GpsTrackWriter } from "./gpsTrackWriter";
export { mergeRecords } from "./recordMerger";
export { serializeTable } from "./schemaWriter";
export { classifyNeeds, needsAny } from "./completeness";
export { loadConfig } from "./config";
export type { ExportConfig, ExportMode } from "./config";
export { toActivityRecord } from "./garminExporter";
export type { CombinedExportSummary, ExportSummary } from "./garminExporter";
export * from "./shared/errors";
export * from "./shared/types";
export default { GarminExporter, ReconciliationEngine, TabularStore, GarminClient };

#!/usr/bin/env node
import * as dotenv from "dotenv";
import { loadConfig } from "./config";
import { GarminExporter, ExportSummary } from "./garminExporter";
import { GarminClient } from "./shared/garminClient";
import { setLogLevel } from "./shared/logger";
import { toError } from "./shared/errors";

// Load environment variables
dotenv.config();

function printSummary(title: string, summary: ExportSummary): void {
  const { counts } = summary;
  console.log(`\n📊 ${title}`);
  console.log(`   Records:   ${summary.total}`);
  console.log(`   New:       ${counts.new}`);
  console.log(`   Updated:   ${counts.updated}`);
  console.log(`   Unchanged: ${counts.unchanged}`);
  console.log(`   Retained:  ${counts.retained}`);
  if (summary.fetchFailures > 0) {
    console.log(`   ⚠️  ${summary.fetchFailures} fetches failed and will be retried next run`);
  }
  if (summary.fallbacks > 0) {
    console.log(`   ⚠️  ${summary.fallbacks} records kept their previous version`);
  }
  console.log(`   File:      ${summary.outputPath}`);
}

async function main() {
  const config = loadConfig(process.env, process.argv.slice(2));
  setLogLevel(config.logLevel);

  console.log("🚀 Garmin History Sync");
  console.log("======================\n");
  if (config.mockMode) {
    console.log("🔄 Running in MOCK mode (test data)\n");
  }
  console.log(`📅 ${config.startDate} → ${config.endDate}\n`);

  const exporter = new GarminExporter(
    new GarminClient(config.email, config.password, config.mockMode)
  );

  const activityOptions = {
    outputPath: config.activitiesOutput,
    gpsTracksDir: config.gpsTracksDir,
    startDate: config.startDate,
    endDate: config.endDate,
  };
  const dailyOptions = {
    outputPath: config.healthOutput,
    startDate: config.startDate,
    endDate: config.endDate,
  };

  if (config.mode === "both") {
    const summary = await exporter.exportAll({ activities: activityOptions, daily: dailyOptions });
    printSummary("Activities", summary.activities);
    printSummary("Daily health", summary.daily);
  } else if (config.mode === "activities") {
    printSummary("Activities", await exporter.exportActivities(activityOptions));
  } else {
    printSummary("Daily health", await exporter.exportDailyHealth(dailyOptions));
  }

  console.log("\n✨ Done!");
}

main().catch((error: unknown) => {
  console.error(`\n❌ Error: ${toError(error).message}`);
  process.exit(1);
});

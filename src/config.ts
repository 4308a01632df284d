import { isIsoDate, todayIsoDate } from "./shared/dates";
import { ConfigError } from "./shared/errors";
import { LogLevel, isLogLevel } from "./shared/logger";

export type ExportMode = "activities" | "daily" | "both";

const EXPORT_MODES: readonly ExportMode[] = ["activities", "daily", "both"];

export const DEFAULT_START_DATE = "2000-01-01";
export const DEFAULT_ACTIVITIES_OUTPUT = "garmin_stats.csv";
export const DEFAULT_HEALTH_OUTPUT = "garmin_daily_health.csv";
export const DEFAULT_GPS_DIR = "gps_tracks";

export interface ExportConfig {
  mode: ExportMode;
  email: string;
  password: string;
  mockMode: boolean;
  startDate: string;
  endDate: string;
  activitiesOutput: string;
  healthOutput: string;
  gpsTracksDir: string;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

// Flags that take a value; everything else starting with -- is a switch
const VALUE_FLAGS = [
  "--start",
  "--end",
  "--output",
  "--health-output",
  "--gps-dir",
  "--log-level",
];

function isExportMode(value: string): value is ExportMode {
  return EXPORT_MODES.some((mode) => mode === value);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Resolve the run configuration from environment variables and command-line
 * arguments (without the node and script entries).
 */
export function loadConfig(env: Env, argv: string[], now: Date = new Date()): ExportConfig {
  const getArgValue = (flag: string): string | undefined => {
    const index = argv.indexOf(flag);
    if (index === -1) return undefined;
    const value = argv[index + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new ConfigError(`Missing value for ${flag}`);
    }
    return value;
  };

  const positional = argv.filter(
    (arg, index) => !arg.startsWith("--") && !VALUE_FLAGS.includes(argv[index - 1])
  );
  if (positional.length > 1) {
    throw new ConfigError(`Unexpected arguments: ${positional.slice(1).join(" ")}`);
  }
  const modeArg = positional[0] ?? "activities";
  if (!isExportMode(modeArg)) {
    throw new ConfigError(`Unknown mode "${modeArg}", expected one of: ${EXPORT_MODES.join(", ")}`);
  }

  const startDate = getArgValue("--start") ?? DEFAULT_START_DATE;
  const endDate = getArgValue("--end") ?? todayIsoDate(now);
  if (!isIsoDate(startDate)) {
    throw new ConfigError(`Invalid start date "${startDate}", expected YYYY-MM-DD`);
  }
  if (!isIsoDate(endDate)) {
    throw new ConfigError(`Invalid end date "${endDate}", expected YYYY-MM-DD`);
  }
  if (startDate > endDate) {
    throw new ConfigError(`Start date ${startDate} is after end date ${endDate}`);
  }

  const logLevel = getArgValue("--log-level") ?? nonEmpty(env.LOG_LEVEL) ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`Invalid log level "${logLevel}"`);
  }

  const mockMode = env.MOCK_MODE === "true" || argv.includes("--mock");
  const email = nonEmpty(env.GARMIN_USER) ?? nonEmpty(env.GARMIN_EMAIL);
  const password = nonEmpty(env.GARMIN_PASSWORD) ?? nonEmpty(env.PASSWORD);

  if (!mockMode && (!email || !password)) {
    throw new ConfigError(
      "Credentials are required: set GARMIN_USER and GARMIN_PASSWORD in .env, or use --mock"
    );
  }

  return {
    mode: modeArg,
    email: email ?? "mock@example.com",
    password: password ?? "mock",
    mockMode,
    startDate,
    endDate,
    activitiesOutput: getArgValue("--output") ?? DEFAULT_ACTIVITIES_OUTPUT,
    healthOutput: getArgValue("--health-output") ?? DEFAULT_HEALTH_OUTPUT,
    gpsTracksDir: getArgValue("--gps-dir") ?? DEFAULT_GPS_DIR,
    logLevel,
  };
}

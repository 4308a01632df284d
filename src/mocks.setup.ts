import {
  ACTIVITY_SEARCH_PATH,
  BODY_BATTERY_PATH,
  DAILY_STEPS_PATH,
  DOWNLOAD_PATH,
  RESTING_HEART_RATE_PATH,
  SLEEP_PATH,
  STRESS_PATH,
  TRAINING_READINESS_PATH,
  TRAINING_STATUS_PATH,
} from "./shared/endpoints";
import { JsonObject } from "./shared/payload";

/**
 * Offline stand-ins for Garmin Connect responses, used by --mock runs.
 * Values are derived from the date so repeated runs see the same data.
 */

type MockParams = Record<string, string | number>;

const MOCK_ACTIVITY_DAYS = 14;

const MOCK_ACTIVITY_TYPES: { typeKey: string; name: string; hasPolyline: boolean }[] = [
  { typeKey: "running", name: "Zone 2 Run", hasPolyline: true },
  { typeKey: "strength_training", name: "Strength Session", hasPolyline: false },
  { typeKey: "cycling", name: "Endurance Ride", hasPolyline: true },
];

export const mockUserProfile = (): { displayName: string; userName: string } => ({
  displayName: "mock-user",
  userName: "mock@example.com",
});

/**
 * Small stable number derived from a string
 */
export const seedFrom = (value: string): number => {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (hash * 31 + value.charCodeAt(i)) % 100003;
  }
  return hash;
};

const param = (params: MockParams | undefined, key: string): string =>
  params && params[key] !== undefined ? String(params[key]) : "";

const lastSegment = (apiPath: string): string => apiPath.split("/").pop() || "";

const shiftDate = (date: string, days: number): string => {
  const shifted = new Date(`${date}T00:00:00Z`);
  shifted.setUTCDate(shifted.getUTCDate() + days);
  return shifted.toISOString().split("T")[0];
};

/**
 * One activity every other day over the last two weeks of the range
 */
export const generateMockActivities = (startDate: string, endDate: string): JsonObject[] => {
  const activities: JsonObject[] = [];

  for (let offset = 0; offset < MOCK_ACTIVITY_DAYS; offset += 2) {
    const date = shiftDate(endDate, -offset);
    if (date < startDate) break;

    const seed = seedFrom(date);
    const type = MOCK_ACTIVITY_TYPES[seed % MOCK_ACTIVITY_TYPES.length];
    const duration = 1500 + (seed % 1800);

    activities.push({
      activityId: 10000000 + seed,
      activityName: type.name,
      activityType: { typeKey: type.typeKey },
      startTimeLocal: `${date} 07:${String(seed % 60).padStart(2, "0")}:00`,
      duration,
      distance: type.hasPolyline ? 5000 + (seed % 6000) : 0,
      calories: 200 + (seed % 600),
      averageHR: 110 + (seed % 40),
      maxHR: 150 + (seed % 30),
      hasPolyline: type.hasPolyline,
    });
  }

  return activities;
};

const mockSleep = (date: string): JsonObject => {
  const seed = seedFrom(date);
  return {
    dailySleepDTO: {
      calendarDate: date,
      sleepTimeSeconds: 23400 + (seed % 7200),
      deepSleepSeconds: 4800 + (seed % 1800),
      lightSleepSeconds: 12600 + (seed % 3600),
      remSleepSeconds: 5400 + (seed % 1200),
      awakeSleepSeconds: 600 + (seed % 900),
      sleepScores: { overall: { value: 60 + (seed % 35) } },
    },
  };
};

const mockStress = (date: string): JsonObject => {
  const seed = seedFrom(date);
  return {
    calendarDate: date,
    avgStressLevel: 20 + (seed % 30),
    maxStressLevel: 70 + (seed % 29),
    restStressDuration: 25000 + (seed % 5000),
    lowStressDuration: 14000 + (seed % 4000),
    mediumStressDuration: 6000 + (seed % 2000),
    highStressDuration: 1200 + (seed % 1200),
  };
};

const mockBodyBattery = (date: string): JsonObject[] => {
  const seed = seedFrom(date);
  const low = 10 + (seed % 20);
  const high = 70 + (seed % 30);
  return [
    {
      date,
      charged: high - low,
      drained: high - low,
      bodyBatteryValuesArray: [
        [Date.parse(`${date}T00:00:00Z`), low + 10],
        [Date.parse(`${date}T06:00:00Z`), high],
        [Date.parse(`${date}T22:00:00Z`), low],
      ],
    },
  ];
};

const mockTrainingStatus = (date: string): JsonObject => {
  const seed = seedFrom(date);
  return {
    mostRecentTrainingStatus: {
      latestTrainingStatusData: {
        "3400000001": {
          calendarDate: date,
          trainingStatus: 3 + (seed % 4),
          trainingStatusFeedbackPhrase: seed % 2 === 0 ? "PRODUCTIVE_1" : "MAINTAINING_2",
        },
      },
    },
  };
};

/**
 * Answer a JSON request the way Garmin Connect would for the mock user
 */
export const mockJsonResponse = (apiPath: string, params?: MockParams): unknown => {
  if (apiPath === ACTIVITY_SEARCH_PATH) {
    const all = generateMockActivities(param(params, "startDate"), param(params, "endDate"));
    const start = Number(param(params, "start") || 0);
    const limit = Number(param(params, "limit") || all.length);
    return all.slice(start, start + limit);
  }
  if (apiPath.startsWith(SLEEP_PATH)) {
    return mockSleep(param(params, "date"));
  }
  if (apiPath.startsWith(STRESS_PATH)) {
    return mockStress(lastSegment(apiPath));
  }
  if (apiPath.startsWith(BODY_BATTERY_PATH)) {
    return mockBodyBattery(param(params, "startDate"));
  }
  if (apiPath.startsWith(RESTING_HEART_RATE_PATH)) {
    const date = param(params, "fromDate");
    return {
      allMetrics: {
        metricsMap: {
          WELLNESS_RESTING_HEART_RATE: [{ value: 48 + (seedFrom(date) % 12), calendarDate: date }],
        },
      },
    };
  }
  if (apiPath.startsWith(DAILY_STEPS_PATH)) {
    const date = lastSegment(apiPath);
    return [{ calendarDate: date, totalSteps: 4000 + (seedFrom(date) % 12000), stepGoal: 10000 }];
  }
  if (apiPath.startsWith(TRAINING_READINESS_PATH)) {
    const score = 30 + (seedFrom(lastSegment(apiPath)) % 70);
    return [{ score, level: score >= 75 ? "HIGH" : score >= 50 ? "MODERATE" : "LOW" }];
  }
  if (apiPath.startsWith(TRAINING_STATUS_PATH)) {
    return mockTrainingStatus(lastSegment(apiPath));
  }
  throw new Error(`Mock mode: no response for ${apiPath}`);
};

/**
 * Minimal track file for a mock activity
 */
export const mockDownload = (apiPath: string): Buffer => {
  if (!apiPath.startsWith(DOWNLOAD_PATH)) {
    throw new Error(`Mock mode: no download for ${apiPath}`);
  }

  const activityId = lastSegment(apiPath);
  if (apiPath.includes("/tcx/")) {
    return Buffer.from(
      `<?xml version="1.0" encoding="UTF-8"?>\n<TrainingCenterDatabase><Activities><Activity><Id>${activityId}</Id></Activity></Activities></TrainingCenterDatabase>\n`,
      "utf-8"
    );
  }
  return Buffer.from(
    `<?xml version="1.0" encoding="UTF-8"?>\n<gpx version="1.1" creator="mock"><trk><name>${activityId}</name><trkseg>` +
      `<trkpt lat="45.5017" lon="-73.5673"></trkpt><trkpt lat="45.5020" lon="-73.5680"></trkpt>` +
      `</trkseg></trk></gpx>\n`,
    "utf-8"
  );
};

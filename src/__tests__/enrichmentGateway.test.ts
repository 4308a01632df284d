const mockLogin = jest.fn();
const mockGetUserProfile = jest.fn();
const mockGet = jest.fn();

jest.mock("garmin-connect", () => ({
  GarminConnect: jest.fn().mockImplementation(() => ({
    login: mockLogin,
    getUserProfile: mockGetUserProfile,
    get: mockGet,
  })),
}));

import {
  GarminEnrichmentGateway,
  parseBodyBattery,
  parseDailySteps,
  parseRestingHeartRate,
  parseSleep,
  parseStress,
  parseTrainingReadiness,
  parseTrainingStatus,
} from "../enrichmentGateway";
import { GarminClient } from "../shared/garminClient";
import { AuthenticationError } from "../shared/errors";
import { setLogLevel } from "../shared/logger";

describe("payload parsers", () => {
  it("should read sleep from the current response shape in hours", () => {
    expect(
      parseSleep({
        dailySleepDTO: {
          sleepTimeSeconds: 27000,
          deepSleepSeconds: 3600,
          remSleepSeconds: 5400,
          sleepScores: { overall: { value: 82 } },
        },
      })
    ).toEqual({
      sleepDuration: 7.5,
      sleepDeepDuration: 1,
      sleepLightDuration: undefined,
      sleepRemDuration: 1.5,
      sleepAwakeDuration: undefined,
      sleepQuality: 82,
    });
  });

  it("should read sleep from the legacy response shape", () => {
    const sleep = parseSleep({ sleep: { sleepTimeSeconds: 3600, sleepQualityScore: 70 } });
    expect(sleep?.sleepDuration).toBe(1);
    expect(sleep?.sleepQuality).toBe(70);
  });

  it("should report no sleep for an empty night", () => {
    expect(parseSleep({ dailySleepDTO: { sleepTimeSeconds: 0 } })).toBeUndefined();
    expect(parseSleep({ dailySleepDTO: { sleepTimeSeconds: null } })).toBeUndefined();
    expect(parseSleep(null)).toBeUndefined();
  });

  it("should accept a zero stress average", () => {
    expect(parseStress([{ averageStressLevel: 0, maxStressLevel: 40 }])).toEqual({
      stressAvg: 0,
      stressMax: 40,
      stressRestDuration: undefined,
      stressLowDuration: undefined,
      stressMediumDuration: undefined,
      stressHighDuration: undefined,
    });
    expect(parseStress({ maxStressLevel: 40 })).toBeUndefined();
  });

  it("should prefer body battery summary values", () => {
    expect(
      parseBodyBattery([{ averageBodyBattery: 50, maxBodyBattery: 90, minBodyBattery: 10 }])
    ).toEqual({ bodyBatteryAvg: 50, bodyBatteryMax: 90, bodyBatteryMin: 10 });
  });

  it("should derive body battery from samples when the summary is missing", () => {
    expect(
      parseBodyBattery([{ bodyBatteryValuesArray: [[1, 20], [2, 80], [3, null], [4, 50]] }])
    ).toEqual({ bodyBatteryAvg: 50, bodyBatteryMax: 80, bodyBatteryMin: 20 });
    expect(parseBodyBattery([{ bodyBatteryValuesArray: [] }])).toBeUndefined();
    expect(parseBodyBattery([])).toBeUndefined();
  });

  it("should read resting heart rate from the metrics map or a flat value", () => {
    expect(
      parseRestingHeartRate({
        allMetrics: { metricsMap: { WELLNESS_RESTING_HEART_RATE: [{ value: 48 }] } },
      })
    ).toEqual({ restingHeartRate: 48 });
    expect(parseRestingHeartRate({ value: 52 })).toEqual({ restingHeartRate: 52 });
    expect(
      parseRestingHeartRate({ allMetrics: { metricsMap: { WELLNESS_RESTING_HEART_RATE: [] } } })
    ).toBeUndefined();
  });

  it("should take the steps of the last day in the answer", () => {
    expect(parseDailySteps([{ totalSteps: 100 }, { totalSteps: 9000 }])).toEqual({
      dailySteps: 9000,
    });
    expect(parseDailySteps([])).toBeUndefined();
  });

  it("should read training readiness", () => {
    expect(parseTrainingReadiness([{ score: 72, level: "HIGH" }])).toEqual({
      trainingReadinessScore: 72,
      trainingReadiness: "HIGH",
    });
    expect(parseTrainingReadiness({})).toBeUndefined();
  });

  it("should read training status from flat or aggregated answers", () => {
    expect(parseTrainingStatus({ status: 4, statusText: "PRODUCTIVE" })).toEqual({
      trainingStatus: 4,
      trainingStatusText: "PRODUCTIVE",
    });
    expect(
      parseTrainingStatus({
        mostRecentTrainingStatus: {
          latestTrainingStatusData: {
            "123": { trainingStatus: 3, trainingStatusFeedbackPhrase: "MAINTAINING_1" },
          },
        },
      })
    ).toEqual({ trainingStatus: 3, trainingStatusText: "MAINTAINING_1" });
    expect(parseTrainingStatus({})).toBeUndefined();
  });
});

describe("GarminEnrichmentGateway", () => {
  let client: GarminClient;
  let gateway: GarminEnrichmentGateway;

  beforeAll(() => {
    setLogLevel("error");
  });

  afterAll(() => {
    setLogLevel("info");
  });

  beforeEach(async () => {
    mockLogin.mockReset().mockResolvedValue(undefined);
    mockGetUserProfile
      .mockReset()
      .mockResolvedValue({ displayName: "runner-1", userName: "runner@example.com" });
    mockGet.mockReset();

    client = new GarminClient("runner@example.com", "test-secret");
    await client.authenticate();
    gateway = new GarminEnrichmentGateway(client);
  });

  it("should request sleep for the profile and the date", async () => {
    mockGet.mockResolvedValue({ dailySleepDTO: { sleepTimeSeconds: 27000 } });

    const result = await gateway.fetchSleep("2024-03-10");

    expect(result.status).toBe("ok");
    expect(result.status === "ok" && result.value.sleepDuration).toBe(7.5);
    expect(mockGet).toHaveBeenCalledWith(
      "https://connectapi.garmin.com/wellness-service/wellness/dailySleepData/runner-1",
      { params: { date: "2024-03-10", nonSleepBufferMinutes: 60 } }
    );
  });

  it("should request stress by date in the path", async () => {
    mockGet.mockResolvedValue({ avgStressLevel: 31 });

    await gateway.fetchStress("2024-03-10");

    expect(mockGet).toHaveBeenCalledWith(
      "https://connectapi.garmin.com/wellness-service/wellness/dailyStress/2024-03-10",
      { params: undefined }
    );
  });

  it("should report an answer without data as unavailable", async () => {
    mockGet.mockResolvedValue({});
    expect(await gateway.fetchStress("2024-03-10")).toEqual({ status: "unavailable" });
  });

  it("should report a failed request as an error", async () => {
    mockGet.mockRejectedValue(new Error("HTTP 500"));

    const result = await gateway.fetchBodyBattery("2024-03-10");

    expect(result.status).toBe("error");
    expect(result.status === "error" && result.error.message).toBe("HTTP 500");
  });

  it("should propagate a missing session", async () => {
    client.release();

    await expect(gateway.fetchStress("2024-03-10")).rejects.toThrow(AuthenticationError);
    await expect(gateway.fetchSleep("2024-03-10")).rejects.toThrow(AuthenticationError);
    expect(mockGet).not.toHaveBeenCalled();
  });

  describe("downloadTrack", () => {
    it("should fall back to the next format when a payload is empty", async () => {
      mockGet
        .mockResolvedValueOnce(Buffer.alloc(0))
        .mockResolvedValueOnce(Buffer.from("<tcx/>", "utf-8"));

      const result = await gateway.downloadTrack("42");

      expect(result.status).toBe("ok");
      if (result.status === "ok") {
        expect(result.value.format).toBe("tcx");
        expect(result.value.data.toString("utf-8")).toBe("<tcx/>");
      }
      expect(mockGet).toHaveBeenNthCalledWith(
        1,
        "https://connectapi.garmin.com/download-service/export/gpx/activity/42",
        { responseType: "arraybuffer" }
      );
    });

    it("should report no track when every format is empty", async () => {
      mockGet.mockResolvedValue(Buffer.alloc(0));
      expect(await gateway.downloadTrack("42")).toEqual({ status: "unavailable" });
    });

    it("should report an error when a format failed and none succeeded", async () => {
      mockGet
        .mockRejectedValueOnce(new Error("HTTP 404"))
        .mockResolvedValueOnce(Buffer.alloc(0));

      const result = await gateway.downloadTrack("42");
      expect(result.status).toBe("error");
    });

    it("should only try the formats it is given", async () => {
      mockGet.mockResolvedValue(Buffer.alloc(0));

      await gateway.downloadTrack("42", ["tcx"]);

      expect(mockGet).toHaveBeenCalledTimes(1);
    });
  });
});

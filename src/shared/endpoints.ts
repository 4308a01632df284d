// Garmin Connect API paths, relative to GARMIN_API_URL

export const ACTIVITY_SEARCH_PATH = "/activitylist-service/activities/search/activities";

export const SLEEP_PATH = "/wellness-service/wellness/dailySleepData";
export const STRESS_PATH = "/wellness-service/wellness/dailyStress";
export const BODY_BATTERY_PATH = "/wellness-service/wellness/bodyBattery/reports/daily";
export const RESTING_HEART_RATE_PATH = "/userstats-service/wellness/daily";
export const DAILY_STEPS_PATH = "/usersummary-service/stats/steps/daily";
export const TRAINING_READINESS_PATH = "/metrics-service/metrics/trainingreadiness";
export const TRAINING_STATUS_PATH = "/metrics-service/metrics/trainingstatus/aggregated";
export const DOWNLOAD_PATH = "/download-service/export";

// metricId of the resting heart rate series in the user stats service
export const RESTING_HEART_RATE_METRIC_ID = 60;

export const sleepPath = (displayName: string) => `${SLEEP_PATH}/${displayName}`;
export const stressPath = (date: string) => `${STRESS_PATH}/${date}`;
export const restingHeartRatePath = (displayName: string) =>
  `${RESTING_HEART_RATE_PATH}/${displayName}`;
export const dailyStepsPath = (startDate: string, endDate: string) =>
  `${DAILY_STEPS_PATH}/${startDate}/${endDate}`;
export const trainingReadinessPath = (date: string) => `${TRAINING_READINESS_PATH}/${date}`;
export const trainingStatusPath = (date: string) => `${TRAINING_STATUS_PATH}/${date}`;
export const downloadPath = (format: string, activityId: string) =>
  `${DOWNLOAD_PATH}/${format}/activity/${activityId}`;

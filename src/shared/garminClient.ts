import { GarminConnect } from "garmin-connect";
import { ACTIVITY_SEARCH_PATH } from "./endpoints";
import { AuthenticationError, toError } from "./errors";
import { setupLogger } from "./logger";
import { JsonObject, isRecord } from "./payload";
import { mockDownload, mockJsonResponse, mockUserProfile } from "../mocks.setup";

const logger = setupLogger("garmin-client");

export const GARMIN_API_URL = "https://connectapi.garmin.com";
const ACTIVITY_PAGE_SIZE = 100;

export type QueryParams = Record<string, string | number>;

// A raw activity summary as returned by the activity search service
export type RawActivity = JsonObject;

/**
 * Shared Garmin session. One instance is authenticated once per run and
 * used for every request of that run, one request at a time.
 */
export class GarminClient {
  private client: GarminConnect;
  private mockMode: boolean;
  private displayName: string | null = null;

  constructor(email: string, password: string, mockMode: boolean = false) {
    this.mockMode = mockMode;
    this.client = new GarminConnect({
      username: email,
      password: password,
    });
  }

  isAuthenticated(): boolean {
    return this.displayName !== null;
  }

  /**
   * Log in and resolve the profile display name, which several wellness
   * endpoints take as a path segment. Resolves false on failure.
   */
  async authenticate(): Promise<boolean> {
    if (this.mockMode) {
      logger.info("🔓 Mock mode: Skipping authentication");
      this.displayName = mockUserProfile().displayName;
      return true;
    }

    try {
      logger.info("🔐 Authenticating with Garmin Connect...");

      await this.client.login();
      const userProfile = await this.client.getUserProfile();
      this.displayName = userProfile.displayName;

      logger.info(`✅ Successfully authenticated as: ${userProfile.userName}`);
      return true;
    } catch (error: unknown) {
      this.displayName = null;
      logger.error(`❌ Authentication error: ${toError(error).message}`);
      return false;
    }
  }

  /**
   * End of run: forget the session so nothing can reuse it
   */
  release(): void {
    this.displayName = null;
  }

  getDisplayName(): string {
    if (this.displayName === null) {
      throw new AuthenticationError("Not authenticated with Garmin Connect");
    }
    return this.displayName;
  }

  /**
   * Authenticated GET returning parsed JSON, left for the caller to narrow
   */
  async getJson(apiPath: string, params?: QueryParams): Promise<unknown> {
    this.getDisplayName();
    if (this.mockMode) {
      return mockJsonResponse(apiPath, params);
    }
    return this.client.get<unknown>(`${GARMIN_API_URL}${apiPath}`, { params });
  }

  /**
   * Authenticated GET of a binary payload such as an activity export
   */
  async download(apiPath: string): Promise<Buffer> {
    this.getDisplayName();
    if (this.mockMode) {
      return mockDownload(apiPath);
    }

    const data = await this.client.get<ArrayBuffer | Buffer | string>(
      `${GARMIN_API_URL}${apiPath}`,
      { responseType: "arraybuffer" }
    );
    if (typeof data === "string") {
      return Buffer.from(data, "utf-8");
    }
    return Buffer.isBuffer(data) ? data : Buffer.from(data);
  }

  /**
   * Every activity that started between the two dates (newest first),
   * fetched in pages from the activity search service
   */
  async listActivities(startDate: string, endDate: string): Promise<RawActivity[]> {
    logger.info(`📥 Fetching activity list from ${startDate} to ${endDate}...`);
    const activities: RawActivity[] = [];

    for (let start = 0; ; start += ACTIVITY_PAGE_SIZE) {
      const page = await this.getJson(ACTIVITY_SEARCH_PATH, {
        startDate,
        endDate,
        start,
        limit: ACTIVITY_PAGE_SIZE,
      });

      if (!Array.isArray(page) || page.length === 0) break;
      activities.push(...page.filter(isRecord));
      if (page.length < ACTIVITY_PAGE_SIZE) break;
    }

    logger.info(`✅ Retrieved ${activities.length} activities`);
    return activities;
  }
}

export default GarminClient;

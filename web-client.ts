/**
 * Strava Web Client
 * Fills gaps in the official API using the authenticated website:
 * activity and route exports, activity deletion, bike components, gear
 * lists, kudos, comments, the dashboard feed and follower lists.
 *
 * The site's internal endpoints are undocumented and change without notice.
 * Unexpected responses surface as StravaParseError.
 */

import { randomUUID } from "node:crypto";

import {
  ACTIVITY_WORKOUT_TYPES,
  ActivityComment,
  BikeComponent,
  BikeDetails,
  DataFormat,
  ExportFile,
  FeedEntry,
  FeedOptions,
  FollowRelationship,
  FollowRelationshipType,
  GearSummary,
  Kudos,
  MentionableEntity,
  ScrapedActivityDetails,
  StravaBike,
  StravaSessionOptions,
  StravaSessionTokens,
  StravaWebClientConfig,
  StravaWebCredentials,
  TrainingActivity,
  TrainingActivityOptions,
} from "./types";
import {
  StravaAuthenticationError,
  StravaNotFoundError,
  StravaRequestError,
  StravaValidationError,
} from "./errors";
import { HttpMethod, discardBody, ensureOk } from "./http";
import { SessionRequestOptions, WebSession, isRedirect } from "./session";
import { StravaClient } from "./client";
import {
  exportFilename,
  parseActivityDetails,
  parseBikeDetails,
  parseComment,
  parseComments,
  parseFeedPage,
  parseFollowPage,
  parseGearList,
  parseJson,
  parseKudos,
  parseMentionableEntities,
  parseTrainingActivities,
} from "./scrapers";
import { componentsOnDate, toEpochSeconds } from "./dates";

/**
 * Site-internal endpoints. Observed from browser traffic; verify against
 * the live site when something starts failing.
 */
export const SITE_ENDPOINTS = {
  activity: (activityId: number) => `/activities/${activityId}`,
  activityExport: (activityId: number, format: DataFormat) =>
    `/activities/${activityId}/export_${format}`,
  routeExport: (routeId: number, format: DataFormat) => `/routes/${routeId}/export_${format}`,
  bike: (bikeId: string) => `/bikes/${bikeId}`,
  bikes: (athleteId: number) => `/athletes/${athleteId}/gear/bikes`,
  shoes: (athleteId: number) => `/athletes/${athleteId}/gear/shoes`,
  trainingActivities: "/athlete/training_activities",
  training: "/athlete/training",
  kudos: (activityId: number) => `/feed/activity/${activityId}/kudos`,
  giveKudos: (activityId: number) => `/feed/activity/${activityId}/kudo`,
  comments: (activityId: number) => `/feed/activity/${activityId}/comments`,
  postComment: (activityId: number) => `/feed/activity/${activityId}/comment`,
  commentReactions: (commentId: number) => `/comments/${commentId}/reactions`,
  feed: "/dashboard/feed",
  follows: (athleteId: number) => `/athletes/${athleteId}/follows`,
  mentionableEntities: "/athlete/mentionable_entities",
} as const;

const TRAINING_ACTIVITIES_PER_PAGE = 20;
const SCRIPT_ACCEPT =
  "text/javascript, application/javascript, application/ecmascript, application/x-ecmascript";

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

/**
 * Redirects from site endpoints mean the request was refused
 * (exporting a manual activity redirects back to the activity page).
 */
async function expectOk(response: Response, context: string): Promise<Response> {
  if (isRedirect(response)) {
    await discardBody(response);
    throw new StravaRequestError(
      `${context}: unexpected redirect (status ${response.status})`,
      response.status
    );
  }
  return ensureOk(response, context);
}

/**
 * Wrap a response body as a single-use stream of chunks
 */
function toExportFile(response: Response, id: number, format: DataFormat): ExportFile {
  const reader = response.body ? response.body.getReader() : null;
  let finished = reader === null;

  const release = async (): Promise<void> => {
    if (!finished && reader) {
      finished = true;
      await reader.cancel();
    }
  };

  async function* stream(): AsyncGenerator<Uint8Array, void, undefined> {
    if (!reader) {
      return;
    }
    try {
      while (true) {
        const chunk = await reader.read();
        if (chunk.done) {
          finished = true;
          return;
        }
        yield chunk.value;
      }
    } finally {
      await release();
    }
  }

  const content = stream();
  return {
    filename: exportFilename(response.headers.get("content-disposition"), id, format),
    contentType: response.headers.get("content-type"),
    content,
    cancel: async () => {
      await content.return(undefined);
      await release();
    },
  };
}

function isJsonResponse(response: Response): boolean {
  const contentType = response.headers.get("content-type") ?? "";
  return contentType.toLowerCase().startsWith("application/json");
}

export class StravaWebClient {
  private readonly session: WebSession;
  private readonly api: StravaClient | null;

  private constructor(session: WebSession, api: StravaClient | null) {
    this.session = session;
    this.api = api;
  }

  /**
   * Create a client from a session token or from an email and password.
   *
   * A session token is trusted without contacting the site. If it has
   * already expired and credentials are given, logs in with those instead.
   */
  public static async create(config: StravaWebClientConfig): Promise<StravaWebClient> {
    const { email, password, sessionToken, accessToken, api, ...sessionOptions } = config;
    const credentials: StravaWebCredentials | null =
      email && password ? { email, password } : null;

    if (!sessionToken && !credentials) {
      throw new StravaValidationError("'sessionToken' or both of 'email' and 'password' are required");
    }

    const session = await StravaWebClient.openSession(sessionToken, credentials, sessionOptions);

    const apiClient =
      api ??
      (accessToken
        ? new StravaClient({
            // Expiry is unknown for a bare access token, so it is never refreshed
            tokens: { accessToken, refreshToken: "", expiresAt: 0 },
            autoRefresh: false,
            timeout: sessionOptions.timeout,
            onRequest: sessionOptions.onRequest,
            onResponse: sessionOptions.onResponse,
          })
        : null);

    return new StravaWebClient(session, apiClient);
  }

  private static async openSession(
    sessionToken: string | undefined,
    credentials: StravaWebCredentials | null,
    options: StravaSessionOptions
  ): Promise<WebSession> {
    if (!sessionToken) {
      if (!credentials) {
        throw new StravaValidationError("Credentials are required to log in");
      }
      return WebSession.login(credentials, options);
    }

    try {
      return WebSession.fromToken(sessionToken, options, credentials);
    } catch (error) {
      if (error instanceof StravaAuthenticationError && credentials) {
        return WebSession.login(credentials, options);
      }
      throw error;
    }
  }

  // ============================================================================
  // Session
  // ============================================================================

  /**
   * Current session token and API access token, for persisting
   */
  public getTokens(): StravaSessionTokens {
    return {
      sessionToken: this.session.getSessionToken(),
      accessToken: this.api?.getTokens()?.accessToken ?? null,
    };
  }

  public getSessionToken(): string | null {
    return this.session.getSessionToken();
  }

  /**
   * Id of the athlete the website session belongs to
   */
  public getAthleteId(): number {
    const athleteId = this.session.getAthleteId();
    if (athleteId === null) {
      throw new StravaAuthenticationError("Athlete id unknown - session has no athlete cookie");
    }
    return athleteId;
  }

  /**
   * The OAuth API client this web client augments
   */
  public getApi(): StravaClient {
    if (!this.api) {
      throw new StravaValidationError("No API client configured. Pass 'accessToken' or 'api'.");
    }
    return this.api;
  }

  /**
   * Check that the API token and the website session belong to the same athlete
   */
  public async verifyAccount(): Promise<void> {
    const athlete = await this.getApi().getAthlete();
    if (athlete.id !== this.getAthleteId()) {
      throw new StravaAuthenticationError("API and web credentials are for different accounts");
    }
  }

  // ============================================================================
  // Request Helpers
  // ============================================================================

  private async getText(
    path: string,
    context: string,
    options: SessionRequestOptions = {}
  ): Promise<string> {
    const response = await this.session.request("GET", path, options);
    await expectOk(response, context);
    return response.text();
  }

  private async getJson(
    path: string,
    context: string,
    options: SessionRequestOptions = {}
  ): Promise<unknown> {
    const text = await this.getText(path, context, { ...options, xhr: true });
    return parseJson(text, context);
  }

  /**
   * XHR-style request with the CSRF header; the response body is ignored
   */
  private async sendAction(method: HttpMethod, path: string, context: string): Promise<void> {
    const response = await this.session.request(method, path, { xhr: true, csrf: "header" });
    await expectOk(response, context);
    await discardBody(response);
  }

  // ============================================================================
  // Exports
  // ============================================================================

  /**
   * Download an activity's data as the originally uploaded file, GPX or TCX.
   *
   * Activities uploaded by older mobile apps have a JSON blob as their
   * original file. When `format` is original and the site answers JSON, the
   * export is repeated in `jsonFormat` unless that is also original.
   */
  public async getActivityData(
    activityId: number,
    format: DataFormat = DataFormat.ORIGINAL,
    jsonFormat: DataFormat = DataFormat.GPX
  ): Promise<ExportFile> {
    const response = await this.session.request(
      "GET",
      SITE_ENDPOINTS.activityExport(activityId, format)
    );
    await expectOk(response, "Download activity");

    if (format === DataFormat.ORIGINAL && jsonFormat !== format && isJsonResponse(response)) {
      await discardBody(response);
      return this.getActivityData(activityId, jsonFormat, DataFormat.ORIGINAL);
    }

    return toExportFile(response, activityId, format);
  }

  /**
   * Download a route as GPX (default) or TCX. Original is treated as GPX.
   */
  public async getRouteData(routeId: number, format: DataFormat = DataFormat.GPX): Promise<ExportFile> {
    const exportFormat = format === DataFormat.ORIGINAL ? DataFormat.GPX : format;
    const response = await this.session.request(
      "GET",
      SITE_ENDPOINTS.routeExport(routeId, exportFormat)
    );
    await expectOk(response, "Download route");

    return toExportFile(response, routeId, exportFormat);
  }

  // ============================================================================
  // Activities
  // ============================================================================

  public async deleteActivity(activityId: number): Promise<void> {
    const response = await this.session.request("POST", SITE_ENDPOINTS.activity(activityId), {
      form: { _method: "delete" },
      csrf: "form",
    });
    await discardBody(response);

    if (response.status === 404) {
      throw new StravaNotFoundError(`Activity ${activityId} not found`);
    }
    if (this.session.redirectPath(response) !== SITE_ENDPOINTS.training) {
      throw new StravaRequestError(
        `Failed to delete activity (status code: ${response.status})`,
        response.status
      );
    }
  }

  /**
   * Details from the activity page the API leaves out: device name, whether
   * the activity was entered manually, and photos.
   */
  public async getActivityDetails(activityId: number): Promise<ScrapedActivityDetails> {
    const html = await this.getText(SITE_ENDPOINTS.activity(activityId), "Activity details");
    return parseActivityDetails(html);
  }

  /**
   * Search the logged-in athlete's activities, newest first, page by page.
   * Filters combine with AND.
   */
  public async *iterateTrainingActivities(
    options: TrainingActivityOptions = {}
  ): AsyncGenerator<TrainingActivity, void, undefined> {
    const workoutType = this.resolveWorkoutType(options);
    const before = options.before ? options.before.getTime() / 1000 : Infinity;
    const after = options.after ? options.after.getTime() / 1000 : -Infinity;
    const flag = (value?: boolean) => (value ? "true" : "");

    const searchSessionId = randomUUID();
    let yielded = 0;
    let page = 1;

    while (true) {
      const data = await this.getJson(SITE_ENDPOINTS.trainingActivities, "Training activities", {
        headers: { Accept: SCRIPT_ACCEPT },
        params: {
          search_session_id: searchSessionId,
          page,
          per_page: TRAINING_ACTIVITIES_PER_PAGE,
          keywords: options.keywords ?? "",
          new_activity_only: "false",
          activity_type: options.activityType ?? "",
          workout_type: workoutType,
          commute: flag(options.commute),
          private_activities: flag(options.isPrivate),
          trainer: flag(options.indoor),
          gear: options.gearId ?? "",
          order: "start_date_local DESC",
        },
      });

      const activities = parseTrainingActivities(data);
      if (activities.length === 0) {
        return;
      }

      for (const activity of activities) {
        if (options.limit !== undefined && yielded >= options.limit) {
          return;
        }

        const startedAt = toEpochSeconds(activity.startDate);
        if (startedAt !== null && startedAt < after) {
          // Newest first: everything after this is older still
          return;
        }
        if (startedAt !== null && startedAt > before) {
          continue;
        }

        yield activity;
        yielded++;
      }

      page++;
    }
  }

  public async getTrainingActivities(
    options: TrainingActivityOptions = {}
  ): Promise<TrainingActivity[]> {
    return collect(this.iterateTrainingActivities(options));
  }

  private resolveWorkoutType(options: TrainingActivityOptions): number | undefined {
    const types = Object.entries(ACTIVITY_WORKOUT_TYPES).find(
      ([activityType]) => activityType === options.activityType
    );

    if (!types) {
      if (options.workoutType !== undefined || options.gearId !== undefined) {
        throw new StravaValidationError(
          `Can only filter by workout type or gear when activity type is one of: ${Object.keys(
            ACTIVITY_WORKOUT_TYPES
          ).join(", ")}`
        );
      }
      return undefined;
    }

    if (options.workoutType === undefined) {
      return undefined;
    }
    const match = Object.entries(types[1]).find(([name]) => name === options.workoutType);
    if (!match) {
      throw new StravaValidationError(
        `Invalid workout type for a ${types[0]}. Must be one of: ${Object.keys(types[1]).join(", ")}`
      );
    }
    return match[1];
  }

  // ============================================================================
  // Gear
  // ============================================================================

  /**
   * Scrape a bike's page for frame, weight and component history
   *
   * @param bikeId - gear id as used by the API, starting with "b"
   */
  public async getBikeDetails(bikeId: string): Promise<BikeDetails> {
    if (!/^b\d+$/.test(bikeId)) {
      throw new StravaValidationError("Invalid bike id (must start with 'b')");
    }

    const html = await this.getText(SITE_ENDPOINTS.bike(bikeId.slice(1)), "Bike details");
    return parseBikeDetails(html);
  }

  /**
   * Components installed on a bike on the given date, or all components.
   * A component counts as installed from its added date up to, but not
   * including, its removed date.
   */
  public async getBikeComponents(
    bikeId: string,
    onDate?: Date | string | null
  ): Promise<BikeComponent[]> {
    const details = await this.getBikeDetails(bikeId);
    return componentsOnDate(details.components, onDate);
  }

  /**
   * API gear record merged with the scraped bike details
   */
  public async getBike(bikeId: string): Promise<StravaBike> {
    const gear = await this.getApi().getGear(bikeId);
    const details = await this.getBikeDetails(bikeId);
    return { ...gear, ...details };
  }

  public async getAllBikes(): Promise<GearSummary[]> {
    const data = await this.getJson(SITE_ENDPOINTS.bikes(this.getAthleteId()), "Bike list");
    return parseGearList(data, "bikes");
  }

  public async getAllShoes(): Promise<GearSummary[]> {
    const data = await this.getJson(SITE_ENDPOINTS.shoes(this.getAthleteId()), "Shoe list");
    return parseGearList(data, "shoes");
  }

  public async getAllGear(): Promise<GearSummary[]> {
    const bikes = await this.getAllBikes();
    const shoes = await this.getAllShoes();
    return [...bikes, ...shoes];
  }

  // ============================================================================
  // Kudos & Comments
  // ============================================================================

  public async getKudos(activityId: number): Promise<Kudos> {
    const data = await this.getJson(SITE_ENDPOINTS.kudos(activityId), "Kudos");
    return parseKudos(data);
  }

  public async giveKudos(activityId: number): Promise<void> {
    await this.sendAction("POST", SITE_ENDPOINTS.giveKudos(activityId), "Give kudos");
  }

  public async getComments(activityId: number): Promise<ActivityComment[]> {
    const data = await this.getJson(SITE_ENDPOINTS.comments(activityId), "Comments");
    return parseComments(data, activityId);
  }

  public async postComment(activityId: number, text: string): Promise<ActivityComment> {
    if (!text.trim()) {
      throw new StravaValidationError("Comment text is required");
    }

    const response = await this.session.request("POST", SITE_ENDPOINTS.postComment(activityId), {
      form: { comment: text },
      xhr: true,
      csrf: "header",
    });
    await expectOk(response, "Post comment");
    return parseComment(parseJson(await response.text(), "Post comment"), activityId);
  }

  public async likeComment(commentId: number): Promise<void> {
    await this.sendAction("POST", SITE_ENDPOINTS.commentReactions(commentId), "Like comment");
  }

  public async unlikeComment(commentId: number): Promise<void> {
    await this.sendAction("DELETE", SITE_ENDPOINTS.commentReactions(commentId), "Unlike comment");
  }

  // ============================================================================
  // Feed
  // ============================================================================

  /**
   * Walk the dashboard feed from newest to oldest.
   * The site's cursor only moves forward, so the sequence cannot be restarted.
   */
  public async *iterateFeed(
    options: FeedOptions = {}
  ): AsyncGenerator<FeedEntry, void, undefined> {
    const feedType = options.feedType ?? "following";
    if (feedType === "club" && options.clubId === undefined) {
      throw new StravaValidationError("clubId is required for the club feed");
    }

    const athleteId = this.getAthleteId();
    let yielded = 0;
    let before: number | undefined;
    let cursor: number | undefined;

    while (true) {
      const data = await this.getJson(SITE_ENDPOINTS.feed, "Feed", {
        params: {
          feed_type: feedType,
          athlete_id: athleteId,
          club_id: feedType === "club" ? options.clubId : undefined,
          before,
          cursor,
        },
      });
      const page = parseFeedPage(data);

      for (const entry of page.entries) {
        if (options.limit !== undefined && yielded >= options.limit) {
          return;
        }
        yield entry;
        yielded++;
      }

      const last = page.entries[page.entries.length - 1];
      if (!page.hasMore || !last) {
        return;
      }
      before = last.updatedAt;
      cursor = last.rank ?? undefined;
    }
  }

  public async getFeed(options: FeedOptions = {}): Promise<FeedEntry[]> {
    return collect(this.iterateFeed(options));
  }

  // ============================================================================
  // Follows
  // ============================================================================

  private async *iterateFollows(
    athleteId: number,
    relationship: FollowRelationshipType
  ): AsyncGenerator<FollowRelationship, void, undefined> {
    const context = relationship === "followers" ? "Followers" : "Following";
    let page = 1;

    while (true) {
      const html = await this.getText(SITE_ENDPOINTS.follows(athleteId), context, {
        params: { type: relationship, page },
      });
      const result = parseFollowPage(html, relationship);
      yield* result.relationships;

      if (!result.hasNextPage || result.relationships.length === 0) {
        return;
      }
      page++;
    }
  }

  /**
   * Athletes following the given athlete (default: the logged-in athlete)
   */
  public iterateFollowers(athleteId?: number): AsyncGenerator<FollowRelationship, void, undefined> {
    return this.iterateFollows(athleteId ?? this.getAthleteId(), "followers");
  }

  /**
   * Athletes the given athlete follows (default: the logged-in athlete)
   */
  public iterateFollowing(athleteId?: number): AsyncGenerator<FollowRelationship, void, undefined> {
    return this.iterateFollows(athleteId ?? this.getAthleteId(), "following");
  }

  public async getFollowers(athleteId?: number): Promise<FollowRelationship[]> {
    return collect(this.iterateFollowers(athleteId));
  }

  public async getFollowing(athleteId?: number): Promise<FollowRelationship[]> {
    return collect(this.iterateFollowing(athleteId));
  }

  /**
   * Athletes and clubs the logged-in athlete can @-mention
   */
  public async getMentionableEntities(): Promise<MentionableEntity[]> {
    const data = await this.getJson(SITE_ENDPOINTS.mentionableEntities, "Mentionable entities");
    return parseMentionableEntities(data);
  }
}

/**
 * Strava Type Definitions
 * Types for the OAuth API collaborator and for records scraped from the website
 */

import type { StravaClient } from "./client";

// ============================================================================
// OAuth Types
// ============================================================================

export interface StravaTokenResponse {
  token_type: string;
  expires_at: number;
  expires_in: number;
  refresh_token: string;
  access_token: string;
}

export interface StravaTokens {
  accessToken: string;
  refreshToken: string;
  expiresAt: number;
}

// ============================================================================
// API Types
// ============================================================================

export interface StravaAthlete {
  id: number;
  username?: string | null;
  resource_state?: number;
  firstname?: string;
  lastname?: string;
  city?: string | null;
  state?: string | null;
  country?: string | null;
  sex?: "M" | "F" | null;
  premium?: boolean;
  created_at?: string;
  updated_at?: string;
  weight?: number;
  profile_medium?: string;
  profile?: string;
  bikes?: StravaGear[];
  shoes?: StravaGear[];
}

export interface StravaActivity {
  id: number;
  resource_state?: number;
  athlete?: { id: number; resource_state?: number };
  name: string;
  distance: number;
  moving_time: number;
  elapsed_time: number;
  total_elevation_gain: number;
  type: string;
  sport_type?: string;
  workout_type?: number | null;
  start_date: string;
  start_date_local: string;
  timezone?: string;
  trainer?: boolean;
  commute?: boolean;
  manual?: boolean;
  private?: boolean;
  flagged?: boolean;
  gear_id?: string | null;
  description?: string | null;
  device_name?: string;
}

export interface StravaGear {
  id: string;
  primary: boolean;
  name: string;
  resource_state?: number;
  distance: number;
  brand_name?: string;
  model_name?: string;
  frame_type?: number;
  description?: string;
}

export interface StravaRoute {
  id: number;
  id_str?: string;
  name: string;
  description?: string | null;
  distance: number;
  elevation_gain: number;
  type: number;
  sub_type: number;
  private: boolean;
  starred: boolean;
  timestamp?: number;
  created_at?: string;
  updated_at?: string;
}

export interface GetActivitiesOptions {
  /** Epoch timestamp - only activities before this time */
  before?: number;
  /** Epoch timestamp - only activities after this time */
  after?: number;
  page?: number;
  per_page?: number;
}

export interface StravaRateLimitInfo {
  shortTerm: { usage: number; limit: number };
  longTerm: { usage: number; limit: number };
}

// ============================================================================
// Logging Types
// ============================================================================

export interface StravaRequestInfo {
  /** HTTP method */
  method: string;
  /** Full URL */
  url: string;
  /** Request headers (Authorization and Cookie values redacted) */
  headers: Record<string, string>;
}

export interface StravaResponseInfo {
  /** HTTP method */
  method: string;
  /** Full URL */
  url: string;
  /** HTTP status code */
  status: number;
  /** Response time in milliseconds */
  duration: number;
}

export interface StravaLoggingHooks {
  /** Optional callback before each request (for logging/debugging) */
  onRequest?: (info: StravaRequestInfo) => void;
  /** Optional callback after each response (for logging/debugging) */
  onResponse?: (info: StravaResponseInfo) => void;
}

// ============================================================================
// Config Types
// ============================================================================

export interface StravaClientConfig extends StravaLoggingHooks {
  /** Strava OAuth client ID (needed for token refresh) */
  clientId?: string;
  /** Strava OAuth client secret (needed for token refresh) */
  clientSecret?: string;
  /** Initial tokens */
  tokens?: StravaTokens;
  /** Auto-refresh tokens when they expire (default: true) */
  autoRefresh?: boolean;
  /** Buffer time in seconds before expiry to trigger refresh (default: 600 = 10 minutes) */
  refreshBuffer?: number;
  /** Default request timeout in milliseconds (default: 30000 = 30 seconds) */
  timeout?: number;
  /** Optional callback when tokens are refreshed */
  onTokenRefresh?: (tokens: StravaTokens) => void | Promise<void>;
}

export interface StravaCsrfToken {
  /** Form field name, from the csrf-param meta tag */
  param: string;
  /** Token value, from the csrf-token meta tag */
  token: string;
}

export interface StravaWebCredentials {
  email: string;
  password: string;
}

export interface StravaSessionOptions extends StravaLoggingHooks {
  /** Website base URL (default: https://www.strava.com) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** User-Agent sent with every website request */
  userAgent?: string;
  /** Known CSRF token; fetched from the site when absent */
  csrf?: StravaCsrfToken;
  /** Called with the new session token after every successful login */
  onSessionChange?: (sessionToken: string) => void | Promise<void>;
}

export interface StravaWebClientConfig extends StravaSessionOptions {
  /** Account email, used for login and for re-login when a session expires */
  email?: string;
  /** Account password */
  password?: string;
  /** Session token (the strava_remember_token JWT) from a previous session */
  sessionToken?: string;
  /** OAuth access token for the API collaborator */
  accessToken?: string;
  /** Pre-configured API client; takes precedence over accessToken */
  api?: StravaClient;
}

export interface StravaSessionTokens {
  sessionToken: string | null;
  accessToken: string | null;
}

// ============================================================================
// Export Types
// ============================================================================

export const DataFormat = {
  ORIGINAL: "original",
  GPX: "gpx",
  TCX: "tcx",
} as const;

export type DataFormat = (typeof DataFormat)[keyof typeof DataFormat];

/**
 * A file exported from the website.
 *
 * `content` streams the response body and can be iterated once. Breaking out
 * of the loop, or calling `cancel()` without reading, releases the connection.
 */
export interface ExportFile {
  /** Filename suggested by the server */
  filename: string;
  contentType: string | null;
  content: AsyncIterable<Uint8Array>;
  cancel(): Promise<void>;
}

// ============================================================================
// Gear Types
// ============================================================================

export const FRAME_TYPES = ["Mountain Bike", "Cross Bike", "Road Bike", "Time Trial Bike"] as const;

export type FrameType = (typeof FRAME_TYPES)[number];

export interface BikeComponent {
  id: number;
  type: string;
  brandName: string;
  modelName: string;
  /** ISO date (YYYY-MM-DD) the component was added */
  added: string | null;
  /** ISO date (YYYY-MM-DD) the component was removed */
  removed: string | null;
  /** Metres */
  distance: number;
}

export interface BikeDetails {
  frameType: FrameType | null;
  brandName: string | null;
  modelName: string | null;
  /** Kilograms */
  weight: number | null;
  components: BikeComponent[];
}

export type StravaBike = StravaGear & BikeDetails;

export interface GearSummary {
  /** Gear id as used by the API ("b123" for bikes, "g123" for shoes) */
  id: string;
  name: string;
  /** Metres */
  distance: number;
  primary: boolean;
  brandName: string | null;
  modelName: string | null;
  description: string | null;
  frameType: FrameType | null;
}

// ============================================================================
// Activity Types
// ============================================================================

export interface ScrapedActivityPhoto {
  uniqueId: string;
  activityId: number | null;
  athleteId: number | null;
  caption: string;
  /** [lat, lng] */
  location: [number, number] | null;
  /** Smallest dimension (pixels) to URL */
  urls: Record<string, string>;
}

export interface ScrapedActivityDetails {
  name: string | null;
  description: string | null;
  deviceName: string | null;
  manual: boolean | null;
  type: string | null;
  photos: ScrapedActivityPhoto[];
}

export const ACTIVITY_WORKOUT_TYPES = {
  Ride: { Default: 10, Race: 11, Workout: 12 },
  Run: { Default: 0, Race: 1, "Long Run": 2, Workout: 3 },
} as const;

export interface TrainingActivity {
  id: number;
  name: string;
  type: string;
  workoutType: string | null;
  /** ISO timestamp */
  startDate: string;
  /** Metres */
  distance: number;
  /** Seconds */
  movingTime: number;
  /** Seconds */
  elapsedTime: number;
  /** Metres */
  elevationGain: number;
  gearId: string | null;
  trainer: boolean;
  commute: boolean;
  private: boolean;
  flagged: boolean;
  hasLatlng: boolean;
}

export interface TrainingActivityOptions {
  /** Text to search for */
  keywords?: string;
  activityType?: string;
  /** Only valid together with a Ride or Run activityType */
  workoutType?: string;
  commute?: boolean;
  isPrivate?: boolean;
  indoor?: boolean;
  /** Only valid together with a Ride or Run activityType */
  gearId?: string;
  before?: Date;
  after?: Date;
  limit?: number;
}

// ============================================================================
// Social Types
// ============================================================================

export interface KudosAthlete {
  id: number;
  name: string;
  firstname: string;
  avatarUrl: string;
  url: string;
  location: string;
  memberType: string;
  isFollowing: boolean;
  isPrivate: boolean;
}

export interface Kudos {
  athletes: KudosAthlete[];
  isOwner: boolean;
  kudosable: boolean;
}

export interface ActivityComment {
  id: number;
  activityId: number;
  athleteId: number;
  athleteName: string;
  avatarUrl: string | null;
  text: string;
  /** ISO timestamp */
  createdAt: string;
  reactionCount: number;
  hasReacted: boolean;
}

export type FeedType = "following" | "my_activity" | "club";

export interface FeedOptions {
  feedType?: FeedType;
  /** Required for the club feed */
  clubId?: number;
  /** Maximum number of entries to yield */
  limit?: number;
}

export interface FeedEntry {
  entity: string;
  /** Cursor timestamp (epoch seconds) */
  updatedAt: number;
  rank: number | null;
  activityId: number | null;
  athleteId: number | null;
  athleteName: string | null;
  name: string | null;
  type: string | null;
  startDate: string | null;
  kudosCount: number | null;
  commentCount: number | null;
}

export interface FeedPage {
  entries: FeedEntry[];
  hasMore: boolean;
}

export type FollowRelationshipType = "followers" | "following";

export interface FollowRelationship {
  athleteId: number;
  name: string;
  avatarUrl: string | null;
  location: string | null;
  relationship: FollowRelationshipType;
  /** State of the follow button as rendered for the logged-in athlete */
  followState: string | null;
}

export interface FollowPage {
  relationships: FollowRelationship[];
  hasNextPage: boolean;
}

export interface MentionableAthlete {
  type: "athlete";
  id: string;
  display: string;
  location: string;
  memberType: string;
  profile: string;
}

export interface MentionableClub {
  type: "club";
  id: string;
  display: string;
  location: string;
  image: string;
}

export type MentionableEntity = MentionableAthlete | MentionableClub;

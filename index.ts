/**
 * Strava Web Extensions
 * Adds website-only features to the Strava API client: activity and route
 * exports, activity deletion, bike components, kudos, comments, feeds and
 * follower lists.
 *
 * @packageDocumentation
 */

// Clients
export { StravaWebClient, SITE_ENDPOINTS } from "./web-client";
export { StravaClient } from "./client";
export { WebSession, decodeSessionToken } from "./session";

// Pure helpers
export { componentsOnDate, isInstalledOn, parseComponentDate } from "./dates";
export { parseContentDispositionFilename } from "./scrapers";

// Constants
export { DataFormat, FRAME_TYPES, ACTIVITY_WORKOUT_TYPES } from "./types";

// Type definitions
export type {
  // OAuth & API
  StravaTokenResponse,
  StravaTokens,
  StravaAthlete,
  StravaActivity,
  StravaGear,
  StravaRoute,
  GetActivitiesOptions,
  StravaRateLimitInfo,
  // Config
  StravaClientConfig,
  StravaWebClientConfig,
  StravaSessionOptions,
  StravaWebCredentials,
  StravaCsrfToken,
  StravaSessionTokens,
  // Logging
  StravaLoggingHooks,
  StravaRequestInfo,
  StravaResponseInfo,
  // Exports
  ExportFile,
  // Gear
  FrameType,
  BikeComponent,
  BikeDetails,
  StravaBike,
  GearSummary,
  // Activities
  ScrapedActivityDetails,
  ScrapedActivityPhoto,
  TrainingActivity,
  TrainingActivityOptions,
  // Social
  Kudos,
  KudosAthlete,
  ActivityComment,
  FeedType,
  FeedOptions,
  FeedEntry,
  FollowRelationshipType,
  FollowRelationship,
  MentionableEntity,
  MentionableAthlete,
  MentionableClub,
} from "./types";

// Error classes
export {
  StravaError,
  StravaAuthenticationError,
  StravaNotFoundError,
  StravaRequestError,
  StravaRateLimitError,
  StravaParseError,
  StravaTokenRefreshError,
  StravaValidationError,
  StravaNetworkError,
  parseStravaError,
  isStravaErrorType,
} from "./errors";

/**
 * Response parsers for the website's pages and internal JSON endpoints.
 *
 * Every parser either returns a fully populated record or throws
 * StravaParseError naming what it could not find.
 */

import * as cheerio from "cheerio";

import {
  ACTIVITY_WORKOUT_TYPES,
  ActivityComment,
  BikeComponent,
  BikeDetails,
  DataFormat,
  FRAME_TYPES,
  FeedEntry,
  FeedPage,
  FollowPage,
  FollowRelationshipType,
  FrameType,
  GearSummary,
  Kudos,
  KudosAthlete,
  MentionableEntity,
  ScrapedActivityDetails,
  ScrapedActivityPhoto,
  StravaCsrfToken,
  TrainingActivity,
} from "./types";
import { StravaParseError } from "./errors";
import { parseComponentDate } from "./dates";

const PHOTOS_REGEX = /var\s+photosJson\s*=\s*(\[.*\]);/;
const PAGE_VIEW_REGEX =
  /pageView\s*=\s*new\s+Strava\.Labs\.Activities\.Pages\.(\S+)PageView\(["']?\d+["']?,\s*["']([^"']+)/;
const NON_NUMBERS = /[^\d.]/g;
const METRES_PER_MILE = 1609.34708;

// ============================================================================
// JSON Helpers
// ============================================================================

type JsonObject = Record<string, unknown>;

export function parseJson(text: string, context: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new StravaParseError("Invalid JSON response", context);
  }
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asObject(value: unknown, context: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new StravaParseError("Expected an object", context);
  }
  return value;
}

function asArray(value: unknown, context: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new StravaParseError("Expected a list", context);
  }
  return value;
}

function readString(obj: JsonObject, key: string, context: string): string {
  const value = obj[key];
  if (typeof value !== "string") {
    throw new StravaParseError(`Missing "${key}"`, context);
  }
  return value;
}

function readOptionalString(obj: JsonObject, key: string): string | null {
  const value = obj[key];
  return typeof value === "string" ? value : null;
}

/** Numbers are sometimes sent as strings ("id": "123") */
function readNumber(obj: JsonObject, key: string, context: string): number {
  const value = readOptionalNumber(obj, key);
  if (value === null) {
    throw new StravaParseError(`Missing "${key}"`, context);
  }
  return value;
}

function readOptionalNumber(obj: JsonObject, key: string): number | null {
  const value = obj[key];
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return null;
}

function readBoolean(obj: JsonObject, key: string, context: string): boolean {
  const value = obj[key];
  if (typeof value !== "boolean") {
    throw new StravaParseError(`Missing "${key}"`, context);
  }
  return value;
}

function readFlag(obj: JsonObject, key: string): boolean {
  return obj[key] === true;
}

// ============================================================================
// Session
// ============================================================================

/**
 * Read the CSRF param name and token from a page's meta tags
 */
export function parseCsrfToken(html: string): StravaCsrfToken {
  const $ = cheerio.load(html);
  const param = $('meta[name="csrf-param"]').attr("content");
  const token = $('meta[name="csrf-token"]').attr("content");

  if (!param || !token) {
    throw new StravaParseError("CSRF meta tags not found", "CSRF token");
  }
  return { param, token };
}

// ============================================================================
// Exports
// ============================================================================

/**
 * Extract the filename from a Content-Disposition header.
 * The RFC 5987 `filename*` form wins over plain `filename`.
 */
export function parseContentDispositionFilename(header: string | null): string | null {
  if (!header) {
    return null;
  }

  const extended = /filename\*\s*=\s*([^']*)'[^']*'([^;]+)/i.exec(header);
  const decoded = extended ? decodePercentEncoded(extended[2].trim(), extended[1].trim()) : null;
  if (decoded) {
    return decoded;
  }

  const plain = /filename\s*=\s*("(?:[^"\\]|\\.)*"|[^;]+)/i.exec(header);
  if (!plain) {
    return null;
  }

  let value = plain[1].trim();
  if (value.startsWith('"') && value.endsWith('"')) {
    value = value.slice(1, -1).replace(/\\(.)/g, "$1");
  }
  return value || null;
}

/**
 * Decode an RFC 5987 value in its declared charset (UTF-8 when none is given)
 */
function decodePercentEncoded(value: string, charset: string): string | null {
  const bytes: number[] = [];
  for (let index = 0; index < value.length; index++) {
    if (value[index] === "%") {
      const hex = value.slice(index + 1, index + 3);
      if (!/^[0-9a-f]{2}$/i.test(hex)) {
        return null;
      }
      bytes.push(parseInt(hex, 16));
      index += 2;
    } else {
      bytes.push(value.charCodeAt(index) & 0xff);
    }
  }

  try {
    return new TextDecoder(charset || "utf-8", { fatal: true }).decode(Uint8Array.from(bytes));
  } catch {
    // unknown charset label or bytes invalid in that charset
    return null;
  }
}

/**
 * Filename for an export, defaulting to the id.
 * The site strips periods from names, so a "." always starts the extension.
 */
export function exportFilename(
  contentDisposition: string | null,
  id: number,
  format: DataFormat
): string {
  const filename = parseContentDispositionFilename(contentDisposition) ?? String(id);
  if (filename.includes(".")) {
    return filename;
  }
  const extension = format === DataFormat.ORIGINAL ? "dat" : format;
  return `${filename}.${extension}`;
}

// ============================================================================
// Gear
// ============================================================================

export function parseFrameType(text: string | number | null | undefined): FrameType | null {
  if (text === null || text === undefined || text === "") {
    return null;
  }
  if (typeof text === "number") {
    const frameType = FRAME_TYPES[text - 1];
    if (!frameType) {
      throw new StravaParseError(`Unknown frame type ${text}`, "Bike details");
    }
    return frameType;
  }

  const normalized = text.trim().toLowerCase().replace(/^tt /, "time trial ");
  const frameType = FRAME_TYPES.find((candidate) => candidate.toLowerCase() === normalized);
  if (!frameType) {
    throw new StravaParseError(`Unknown frame type "${text.trim()}"`, "Bike details");
  }
  return frameType;
}

/**
 * Convert "1,234.5 km" or "12 mi" into metres
 */
function parseComponentDistance(text: string): number {
  const multiplier = text.endsWith("mi") ? METRES_PER_MILE : 1000;
  const value = parseFloat(text.replace(/[\skmi]+$/, "").replace(/,/g, ""));
  if (Number.isNaN(value)) {
    throw new StravaParseError(`Invalid component distance "${text}"`, "Bike components");
  }
  return Math.trunc(value * multiplier);
}

/**
 * Parse the bike page: details table plus the component history table
 */
export function parseBikeDetails(html: string): BikeDetails {
  const $ = cheerio.load(html);

  const gearTable = $("div.gear-details table").first();
  if (gearTable.length === 0) {
    throw new StravaParseError("Bike details table not found - layout update?", "Bike details");
  }

  const values = gearTable
    .find("td")
    .toArray()
    .map((cell) => $(cell).text().trim())
    .filter((_, index) => index % 2 === 1);
  if (values.length < 4) {
    throw new StravaParseError(
      `Expected 4 bike details, found ${values.length} - layout update?`,
      "Bike details"
    );
  }
  const [frameText, brandText, modelText, weightText] = values;

  const weightDigits = weightText ? weightText.replace(NON_NUMBERS, "") : "";

  const componentTable = $("table")
    .toArray()
    .map((table) => $(table))
    .find((table) => table.find("thead").length > 0);
  if (!componentTable) {
    throw new StravaParseError("Bike component table not found - layout update?", "Bike components");
  }

  const components: BikeComponent[] = [];
  for (const row of componentTable.find("tbody tr").toArray()) {
    const cells = $(row).find("td");
    // "No active components" and similar messages span fewer cells
    if (cells.length < 7) {
      continue;
    }
    const text = cells.toArray().map((cell) => $(cell).text().trim());

    const deleteLink = cells
      .eq(6)
      .find("a")
      .filter((_, link) => $(link).text().trim() === "Delete")
      .attr("href");
    const id = deleteLink ? parseInt(deleteLink.split("/").pop() ?? "", 10) : NaN;
    if (Number.isNaN(id)) {
      throw new StravaParseError("Component id not found", "Bike components");
    }

    components.push({
      id,
      type: text[0],
      brandName: text[1],
      modelName: text[2],
      added: parseComponentDate(text[3]),
      removed: parseComponentDate(text[4]),
      distance: parseComponentDistance(text[5]),
    });
  }

  return {
    frameType: parseFrameType(frameText),
    brandName: brandText || null,
    modelName: modelText || null,
    weight: weightDigits ? parseFloat(weightDigits) : null,
    components,
  };
}

/**
 * Gear ids are prefixed the way the API prefixes them ("b123", "g456")
 */
function gearId(value: unknown, prefix: "b" | "g", context: string): string {
  if (typeof value === "number" || (typeof value === "string" && /^\d+$/.test(value))) {
    return `${prefix}${value}`;
  }
  if (typeof value === "string" && /^[bg]\d+$/.test(value)) {
    return value;
  }
  throw new StravaParseError('Missing "id"', context);
}

/**
 * Parse the gear list JSON for bikes or shoes
 */
export function parseGearList(data: unknown, kind: "bikes" | "shoes"): GearSummary[] {
  const context = kind === "bikes" ? "Bike list" : "Shoe list";

  return asArray(data, context).map((item) => {
    const gear = asObject(item, context);
    const id = gearId(gear["id"], kind === "bikes" ? "b" : "g", context);
    const name = readOptionalString(gear, "display_name") ?? readString(gear, "name", context);

    // total_distance is a km string such as "1,234.5"
    const totalDistance = readOptionalString(gear, "total_distance");
    const distance = totalDistance
      ? Math.round(parseFloat(totalDistance.replace(/,/g, "")) * 1000)
      : readNumber(gear, "distance", context);
    if (Number.isNaN(distance)) {
      throw new StravaParseError(`Invalid total_distance "${totalDistance}"`, context);
    }

    const frameType = gear["frame_type"];
    return {
      id,
      name,
      distance,
      primary: readFlag(gear, "default") || readFlag(gear, "primary"),
      brandName: readOptionalString(gear, "brand_name"),
      modelName: readOptionalString(gear, "model_name"),
      description: readOptionalString(gear, "description"),
      frameType:
        typeof frameType === "number" || typeof frameType === "string"
          ? parseFrameType(frameType)
          : null,
    };
  });
}

// ============================================================================
// Activities
// ============================================================================

/** Photo captions arrive with \uXXXX escapes left in the string */
function decodeUnicodeEscapes(value: string): string {
  return value.replace(/\\u([0-9a-fA-F]{4})/g, (_, hex: string) =>
    String.fromCharCode(parseInt(hex, 16))
  );
}

function parsePhoto(item: unknown): ScrapedActivityPhoto {
  const context = "Activity photos";
  const photo = asObject(item, context);

  const urls: Record<string, string> = {};
  const dimensions = photo["dimensions"];
  if (isJsonObject(dimensions)) {
    for (const [name, dimension] of Object.entries(dimensions)) {
      const url = photo[name];
      if (!isJsonObject(dimension) || typeof url !== "string") continue;
      const sizes = Object.values(dimension).filter((v): v is number => typeof v === "number");
      if (sizes.length > 0) {
        urls[String(Math.min(...sizes))] = url;
      }
    }
  }

  const lat = readOptionalNumber(photo, "lat");
  const lng = readOptionalNumber(photo, "lng");

  return {
    uniqueId: readString(photo, "photo_id", context),
    activityId: readOptionalNumber(photo, "activity_id"),
    athleteId: readOptionalNumber(photo, "owner_id"),
    caption: decodeUnicodeEscapes(readOptionalString(photo, "caption_escaped") ?? ""),
    location: lat !== null && lng !== null ? [lat, lng] : null,
    urls,
  };
}

/**
 * Parse the activity page for details the API does not return
 */
export function parseActivityDetails(html: string): ScrapedActivityDetails {
  const $ = cheerio.load(html);
  const details: ScrapedActivityDetails = {
    name: null,
    description: null,
    deviceName: null,
    manual: null,
    type: null,
    photos: [],
  };

  const summary = $("div.activity-summary-container").first();
  let foundPageView = false;
  const textOf = (selector: string): string | null => {
    const element = summary.find(selector).first();
    return element.length > 0 ? element.text().trim() : null;
  };
  details.name = textOf("h1.activity-name");
  details.description = textOf("div.activity-description");
  details.deviceName = textOf("div.device");

  for (const script of $("script").toArray()) {
    const source = $(script).html() ?? "";

    if (source.includes("var pageView;")) {
      const match = PAGE_VIEW_REGEX.exec(source);
      if (!match) {
        throw new StravaParseError("Failed to extract activity type", "Activity details");
      }
      foundPageView = true;
      details.manual = match[1].toLowerCase() === "manual";
      details.type = match[2];
    } else if (source.includes("var photosJson")) {
      const match = PHOTOS_REGEX.exec(source);
      if (!match) {
        throw new StravaParseError("Failed to extract photo data", "Activity details");
      }
      details.photos = asArray(parseJson(match[1], "Activity photos"), "Activity photos").map(
        parsePhoto
      );
    }
  }

  if (summary.length === 0 && !foundPageView) {
    throw new StravaParseError("Activity page structure not found - layout update?", "Activity details");
  }
  return details;
}

function workoutTypeName(activityType: string, code: number | null): string | null {
  const types = Object.entries(ACTIVITY_WORKOUT_TYPES).find(([name]) => name === activityType);
  if (code === null || !types) {
    return null;
  }
  const match = Object.entries(types[1]).find(([, value]) => value === code);
  return match ? match[0] : null;
}

/**
 * Parse one page of the training activity search
 */
export function parseTrainingActivities(data: unknown): TrainingActivity[] {
  const context = "Training activities";
  const models = asArray(asObject(data, context)["models"], context);

  return models.map((item) => {
    const activity = asObject(item, context);
    const type = readString(activity, "type", context);

    const bikeId = readOptionalNumber(activity, "bike_id");
    const shoeId = readOptionalNumber(activity, "athlete_gear_id");
    const gearId = bikeId !== null ? `b${bikeId}` : shoeId !== null ? `g${shoeId}` : null;

    return {
      id: readNumber(activity, "id", context),
      name: readString(activity, "name", context),
      type,
      workoutType: workoutTypeName(type, readOptionalNumber(activity, "workout_type")),
      startDate: readString(activity, "start_time", context),
      distance: readOptionalNumber(activity, "distance_raw") ?? 0,
      movingTime: readOptionalNumber(activity, "moving_time_raw") ?? 0,
      elapsedTime: readOptionalNumber(activity, "elapsed_time_raw") ?? 0,
      elevationGain: readOptionalNumber(activity, "elevation_gain_raw") ?? 0,
      gearId,
      trainer: readFlag(activity, "trainer"),
      commute: readFlag(activity, "commute"),
      private: readFlag(activity, "private"),
      flagged: readFlag(activity, "flagged"),
      hasLatlng: readFlag(activity, "has_latlng"),
    };
  });
}

// ============================================================================
// Social
// ============================================================================

export function parseKudos(data: unknown): Kudos {
  const context = "Kudos";
  const kudos = asObject(data, context);

  const athletes = asArray(kudos["athletes"], context).map((item): KudosAthlete => {
    const athlete = asObject(item, context);
    return {
      id: readNumber(athlete, "id", context),
      name: readString(athlete, "name", context),
      firstname: readOptionalString(athlete, "firstname") ?? "",
      avatarUrl: readOptionalString(athlete, "avatar_url") ?? "",
      url: readOptionalString(athlete, "url") ?? "",
      location: readOptionalString(athlete, "location") ?? "",
      memberType: readOptionalString(athlete, "member_type") ?? "",
      isFollowing: readFlag(athlete, "is_following"),
      isPrivate: readFlag(athlete, "is_private"),
    };
  });

  return {
    athletes,
    isOwner: readBoolean(kudos, "is_owner", context),
    kudosable: readBoolean(kudos, "kudosable", context),
  };
}

export function parseComment(data: unknown, activityId: number): ActivityComment {
  const context = "Comment";
  const comment = asObject(data, context);
  const athlete = asObject(comment["athlete"], context);

  return {
    id: readNumber(comment, "id", context),
    activityId: readOptionalNumber(comment, "parent_id") ?? activityId,
    athleteId: readNumber(athlete, "id", context),
    athleteName: readString(athlete, "display_name", context),
    avatarUrl: readOptionalString(athlete, "avatar_url"),
    text: readString(comment, "text", context),
    createdAt: readString(comment, "created_at", context),
    reactionCount: readOptionalNumber(comment, "reaction_count") ?? 0,
    hasReacted: readFlag(comment, "has_reacted"),
  };
}

/**
 * The comments endpoint answers either a bare list or `{ comments: [...] }`
 */
export function parseComments(data: unknown, activityId: number): ActivityComment[] {
  const list = isJsonObject(data) ? data["comments"] : data;
  return asArray(list, "Comments").map((item) => parseComment(item, activityId));
}

function parseFeedEntry(item: unknown): FeedEntry {
  const context = "Feed entry";
  const entry = asObject(item, context);
  const cursor = asObject(entry["cursorData"], context);

  const feedEntry: FeedEntry = {
    entity: readString(entry, "entity", context),
    updatedAt: readNumber(cursor, "updated_at", context),
    rank: readOptionalNumber(cursor, "rank"),
    activityId: null,
    athleteId: null,
    athleteName: null,
    name: null,
    type: null,
    startDate: null,
    kudosCount: null,
    commentCount: null,
  };

  if (feedEntry.entity !== "Activity") {
    return feedEntry;
  }

  const activity = asObject(entry["activity"], context);
  const athlete = asObject(activity["athlete"], context);
  const kudosAndComments = activity["kudosAndComments"];
  const social: JsonObject = isJsonObject(kudosAndComments) ? kudosAndComments : {};

  return {
    ...feedEntry,
    activityId: readNumber(activity, "id", context),
    athleteId: readNumber(athlete, "athleteId", context),
    athleteName: readString(athlete, "athleteName", context),
    name: readString(activity, "activityName", context),
    type: readString(activity, "type", context),
    startDate: readOptionalString(activity, "startDate"),
    kudosCount: readOptionalNumber(social, "kudosCount") ?? 0,
    commentCount: readOptionalNumber(social, "commentsCount") ?? 0,
  };
}

export function parseFeedPage(data: unknown): FeedPage {
  const context = "Feed";
  const page = asObject(data, context);
  const entries = asArray(page["entries"], context).map(parseFeedEntry);
  const paginationData = page["pagination"];
  const pagination: JsonObject = isJsonObject(paginationData) ? paginationData : {};

  return {
    entries,
    hasMore: readFlag(pagination, "hasMore"),
  };
}

/**
 * Parse one page of an athlete's followers or followed athletes
 */
export function parseFollowPage(html: string, relationship: FollowRelationshipType): FollowPage {
  const context = relationship === "followers" ? "Followers" : "Following";
  const $ = cheerio.load(html);

  const list = $("ul.list-athletes").first();
  if (list.length === 0) {
    throw new StravaParseError("Athlete list not found - layout update?", context);
  }

  const relationships = list
    .children("li")
    .toArray()
    .map((row) => {
      const item = $(row);
      const athleteId = parseInt(item.attr("data-athlete-id") ?? "", 10);
      const name = item.find(".athlete-name").first().text().trim();
      if (Number.isNaN(athleteId) || !name) {
        throw new StravaParseError("Athlete row without id or name", context);
      }

      const location = item.find(".location").first().text().trim();
      return {
        athleteId,
        name,
        avatarUrl: item.find("img.avatar-img").attr("src") ?? null,
        location: location || null,
        relationship,
        followState: item.find("button[data-state]").attr("data-state") ?? null,
      };
    });

  const nextPage = $(".pagination .next_page").first();
  return {
    relationships,
    hasNextPage: nextPage.length > 0 && !nextPage.hasClass("disabled"),
  };
}

export function parseMentionableEntities(data: unknown): MentionableEntity[] {
  const context = "Mentionable entities";

  return asArray(data, context).map((item): MentionableEntity => {
    const entity = asObject(item, context);
    const type = readString(entity, "type", context);
    const id = String(readNumber(entity, "id", context));
    const display = readString(entity, "display", context);
    const location = readOptionalString(entity, "location") ?? "";

    if (type === "athlete") {
      return {
        type,
        id,
        display,
        location,
        memberType: readOptionalString(entity, "member_type") ?? "",
        profile: readOptionalString(entity, "profile") ?? "",
      };
    }
    if (type === "club") {
      return { type, id, display, location, image: readOptionalString(entity, "image") ?? "" };
    }
    throw new StravaParseError(`Unknown entity type "${type}"`, context);
  });
}

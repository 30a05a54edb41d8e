import { DateTime } from "luxon";

import { BikeComponent } from "./types";
import { StravaParseError, StravaValidationError } from "./errors";

/** Date used for components the site lists as installed "Since Beginning" */
export const BEGINNING_OF_TIME = "1970-01-01";

const COMPONENT_DATE_FORMATS = ["LLL d, yyyy", "LLL dd, yyyy", "LLLL d, yyyy"];

/**
 * Parse a component date as shown on the bike page ("Mar 3, 2019").
 * Returns an ISO date, or null for a blank cell.
 */
export function parseComponentDate(value: string | null | undefined): string | null {
  const text = value?.trim();
  if (!text) {
    return null;
  }
  if (text.toLowerCase() === "since beginning") {
    return BEGINNING_OF_TIME;
  }

  for (const format of COMPONENT_DATE_FORMATS) {
    const parsed = DateTime.fromFormat(text, format, { zone: "utc", locale: "en-US" });
    if (parsed.isValid) {
      return parsed.toISODate();
    }
  }
  throw new StravaParseError(`Invalid component date "${text}"`, "Bike components");
}

/**
 * Normalize a reference date to an ISO calendar date (UTC)
 */
export function toIsoDate(date: Date | string): string {
  const parsed =
    typeof date === "string"
      ? DateTime.fromISO(date, { zone: "utc" })
      : DateTime.fromJSDate(date, { zone: "utc" });

  const iso = parsed.isValid ? parsed.toISODate() : null;
  if (!iso) {
    throw new StravaValidationError(`Invalid date: ${String(date)}`);
  }
  return iso;
}

/**
 * Whether a component was installed on the given ISO date.
 * The removal date is exclusive: a part removed on a day was not on the bike that day.
 */
export function isInstalledOn(component: BikeComponent, isoDate: string): boolean {
  const installed = component.added === null || component.added <= isoDate;
  const notYetRemoved = component.removed === null || isoDate < component.removed;
  return installed && notYetRemoved;
}

/**
 * Components installed on the given date; all components when no date is given
 */
export function componentsOnDate(
  components: BikeComponent[],
  onDate?: Date | string | null
): BikeComponent[] {
  if (onDate === undefined || onDate === null) {
    return components;
  }
  const isoDate = toIsoDate(onDate);
  return components.filter((component) => isInstalledOn(component, isoDate));
}

/**
 * Epoch seconds of an ISO timestamp ("2024-05-01T07:30:00+0000"), or null
 */
export function toEpochSeconds(timestamp: string): number | null {
  const parsed = DateTime.fromISO(timestamp, { setZone: true });
  return parsed.isValid ? parsed.toSeconds() : null;
}

/**
 * Export Example
 * Downloads the original files of recent activities and a route as GPX,
 * streaming each one straight to disk.
 */

import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import { basename, join } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

import { StravaWebClient, StravaRequestError, DataFormat } from "../index";
import type { ExportFile } from "../index";

const OUTPUT_DIR = process.env.EXPORT_DIR ?? "exports";

async function save(file: ExportFile): Promise<string> {
  const path = join(OUTPUT_DIR, basename(file.filename));
  await pipeline(Readable.from(file.content), createWriteStream(path));
  return path;
}

async function exportActivities() {
  const client = await StravaWebClient.create({
    sessionToken: process.env.STRAVA_SESSION_TOKEN ?? "",
  });
  await mkdir(OUTPUT_DIR, { recursive: true });

  for await (const activity of client.iterateTrainingActivities({ limit: 10 })) {
    try {
      // Files from older mobile apps come back as TCX instead of JSON
      const file = await client.getActivityData(activity.id, DataFormat.ORIGINAL, DataFormat.TCX);
      console.log(`${activity.name}: ${await save(file)}`);
    } catch (error) {
      // Manual activities have nothing to export
      if (error instanceof StravaRequestError) {
        console.log(`${activity.name}: skipped (${error.message})`);
        continue;
      }
      throw error;
    }
  }

  const routeId = Number(process.env.STRAVA_ROUTE_ID ?? "0");
  if (routeId > 0) {
    const route = await client.getRouteData(routeId);
    console.log(`Route ${routeId}: ${await save(route)}`);
  }
}

if (require.main === module) {
  exportActivities().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}

export default exportActivities;

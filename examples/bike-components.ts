/**
 * Bike Components Example
 * Lists the components that were on a bike for a given ride.
 */

import { StravaWebClient, StravaClient } from "../index";

async function componentsForRide(activityId: number) {
  const api = new StravaClient({
    clientId: process.env.STRAVA_CLIENT_ID ?? "",
    clientSecret: process.env.STRAVA_CLIENT_SECRET ?? "",
    tokens: {
      accessToken: process.env.STRAVA_ACCESS_TOKEN ?? "",
      refreshToken: process.env.STRAVA_REFRESH_TOKEN ?? "",
      expiresAt: parseInt(process.env.STRAVA_EXPIRES_AT ?? "0", 10),
    },
  });
  const client = await StravaWebClient.create({
    sessionToken: process.env.STRAVA_SESSION_TOKEN ?? "",
    api,
  });

  const ride = (await api.getActivities({ per_page: 50 })).find((a) => a.id === activityId);
  const bikeId = ride?.gear_id;
  if (!ride || !bikeId || !bikeId.startsWith("b")) {
    console.log(`Activity ${activityId} has no bike`);
    return;
  }

  const bike = await client.getBike(bikeId);
  console.log(`${bike.name} (${bike.frameType ?? "unknown frame"}, ${bike.weight ?? "?"} kg)`);

  const components = await client.getBikeComponents(bikeId, ride.start_date_local);
  for (const component of components) {
    console.log(
      `  ${component.type}: ${component.brandName} ${component.modelName}` +
        ` since ${component.added ?? "?"} (${Math.round(component.distance / 1000)} km)`
    );
  }
}

if (require.main === module) {
  componentsForRide(Number(process.argv[2] ?? "0")).catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}

export default componentsForRide;

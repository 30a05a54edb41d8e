/**
 * Basic Usage Example
 * Logs into the website, checks the API token belongs to the same athlete,
 * and prints a few things the API does not return.
 */

import {
  StravaWebClient,
  StravaAuthenticationError,
  StravaError,
  StravaParseError,
} from "../index";

async function basicUsage() {
  const client = await StravaWebClient.create({
    email: process.env.STRAVA_EMAIL ?? "",
    password: process.env.STRAVA_PASSWORD ?? "",
    // Reuse a saved session to skip the login round trip
    sessionToken: process.env.STRAVA_SESSION_TOKEN || undefined,
    accessToken: process.env.STRAVA_ACCESS_TOKEN || undefined,
    onSessionChange: (sessionToken) => {
      console.log("   [Session changed, save the new token]");
      console.log(`   ${sessionToken.substring(0, 20)}...`);
    },
    onRequest: (info) => console.log(`   -> ${info.method} ${info.url}`),
  });

  console.log("Strava Web Extensions - Basic Usage Example\n");

  try {
    console.log(`1. Logged in as athlete ${client.getAthleteId()}`);

    if (process.env.STRAVA_ACCESS_TOKEN) {
      await client.verifyAccount();
      console.log("   API token and website session match\n");
    }

    console.log("2. Gear:");
    for (const gear of await client.getAllGear()) {
      const km = (gear.distance / 1000).toFixed(1);
      console.log(`   ${gear.id} ${gear.name} (${km} km)${gear.primary ? " [primary]" : ""}`);
    }

    console.log("\n3. Recent rides:");
    const rides = await client.getTrainingActivities({ activityType: "Ride", limit: 5 });
    for (const ride of rides) {
      console.log(`   ${ride.startDate} ${ride.name} ${ride.workoutType ?? ""}`);
    }

    const latest = rides[0];
    if (latest) {
      const details = await client.getActivityDetails(latest.id);
      console.log(`\n4. Latest ride recorded with: ${details.deviceName ?? "unknown device"}`);
    }
  } catch (error) {
    if (error instanceof StravaAuthenticationError) {
      console.error("Login failed or the session was rejected:", error.message);
    } else if (error instanceof StravaParseError) {
      console.error("The website layout may have changed:", error.message);
    } else if (error instanceof StravaError) {
      console.error(`Strava error (${error.code}):`, error.message);
    } else {
      throw error;
    }
  }
}

if (require.main === module) {
  basicUsage().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}

export default basicUsage;

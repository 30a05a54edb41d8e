/**
 * Social Example
 * Walks the dashboard feed, thanks everyone who left kudos on your
 * latest activity, and prints follower counts.
 */

import { StravaWebClient } from "../index";

async function social() {
  const client = await StravaWebClient.create({
    email: process.env.STRAVA_EMAIL ?? "",
    password: process.env.STRAVA_PASSWORD ?? "",
  });

  console.log("Latest from people you follow:");
  for await (const entry of client.iterateFeed({ limit: 10 })) {
    if (entry.entity !== "Activity") continue;
    console.log(`  ${entry.athleteName}: ${entry.name} (${entry.kudosCount} kudos)`);
  }

  const [mine] = await client.getFeed({ feedType: "my_activity", limit: 1 });
  if (mine?.activityId) {
    const kudos = await client.getKudos(mine.activityId);
    if (kudos.athletes.length > 0) {
      const names = kudos.athletes.map((athlete) => athlete.firstname).join(", ");
      await client.postComment(mine.activityId, `Thanks for the kudos ${names}!`);
    }

    for (const comment of await client.getComments(mine.activityId)) {
      if (!comment.hasReacted && comment.athleteId !== client.getAthleteId()) {
        await client.likeComment(comment.id);
      }
    }
  }

  const followers = await client.getFollowers();
  const following = await client.getFollowing();
  console.log(`\n${followers.length} followers, following ${following.length}`);
}

if (require.main === module) {
  social().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}

export default social;

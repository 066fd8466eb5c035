import { config } from "dotenv";
import { ForumClient, loadForumConfig, renderPostMessage } from "../src/index.js";
config();

/**
 * Print the newest forum posts as they would be delivered.
 *
 * Reads FORUM_BASE_URL, FORUM_COOKIE and MAX_POSTS_PER_CHECK from the environment or a local .env file.
 */
async function main() {
  const client = new ForumClient(loadForumConfig());

  console.log("📰 Fetching latest posts...");
  const posts = await client.fetchLatestPosts();

  for (const post of posts) {
    const details = await post.ensureLoaded();
    console.log(`${renderPostMessage(post, details)}\n`);
    if (details.images.length > 0) {
      console.log(`Images:\n${details.images.join("\n")}\n`);
    }
  }
}

main().catch(console.error);

import type { PostDetails, PostSummary } from "../types.js";
import { formatLocalDateTime } from "../utils/time.js";

/**
 * Renders a loaded post as the message text handed to the delivery layer.
 * Length limits are left to the delivery layer.
 */
export function renderPostMessage(post: PostSummary, details: PostDetails): string {
  let message = `**${post.title}**\n`;
  message += `${post.author} \\ ${formatLocalDateTime(details.publishTime, false)}\n`;

  if (details.tags.length > 0) {
    message += `标签: ${details.tags.join(", ")}\n`;
  }

  message += `${details.content}\n`;
  message += `\n[查看原帖](${post.url})`;
  return message;
}

import type {
  MarkupNode,
  ExtractionResult,
  ExtractorOptions,
  LinkPlatform,
  PostDetails,
  PostSummary,
  PostDetailsLoader,
  ForumClientOptions,
} from "./types.js";

export type {
  MarkupNode,
  ExtractionResult,
  ExtractorOptions,
  LinkPlatform,
  PostDetails,
  PostSummary,
  PostDetailsLoader,
  ForumClientOptions,
};
export { ContentExtractor, extractContent, extractionFailure } from "./extract/ContentExtractor.js";
export { classifyNode } from "./extract/tag-classifier.js";
export type { NodeKind } from "./extract/tag-classifier.js";
export { assembleText } from "./extract/text-assembler.js";
export { collectTags } from "./extract/tag-collector.js";
export { resolveUrl, isDataUri } from "./extract/url-resolver.js";
export { parseMarkup, toMarkupNode, flattenText } from "./markup/markup-node.js";
export { ForumClient } from "./ForumClient.js";
export { ForumPost } from "./ForumPost.js";
export { renderPostMessage } from "./render/post-message.js";
export { loadForumConfig } from "./config.js";
export type { ForumEnv } from "./config.js";
export { ForumError, ForumHttpError } from "./errors.js";
export type { ForumErrorCode, ForumErrorDetails } from "./errors.js";
export { EXTRACTION_FAILED_TEXT, LOAD_FAILED_TEXT } from "./constants.js";

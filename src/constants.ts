export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/137.0.0.0 Safari/537.36";

export const COMMON_HEADERS: Readonly<Record<string, string>> = {
  "User-Agent": DEFAULT_USER_AGENT,
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8",
  "Accept-Language": "zh-CN,zh;q=0.9,en;q=0.8",
};

export const DEFAULT_MAX_POSTS = 10;
export const DEFAULT_MAX_DEPTH = 256;

// Forum paths and element ids
export const LATEST_THREADS_PATH = "/forum.php?mod=guide&view=newthread";
export const LATEST_THREADS_ANCHOR_ID = "forumnew";
export const POST_LIST_ID = "postlist";
export const POST_ELEMENT_ID_PREFIX = "post_";
export const POST_MESSAGE_ID_PREFIX = "postmessage_";
export const POST_TIME_ID_PREFIX = "authorposton";

// Sentinel texts
export const EXTRACTION_FAILED_TEXT = "内容解析失败";
export const LOAD_FAILED_TEXT = "内容加载失败";

// Markers
export const EMBED_MARKER = "[嵌入内容]";
export const LINK_LABEL = "链接";
export const WIDGET_LABEL = "小部件";
export const COUNTDOWN_LABEL = "倒计时";
// Countdown targets render with a four-digit year; anything later is not a seconds timestamp.
export const MAX_COUNTDOWN_YEAR = 9999;

// Attribute holding the original upload path on forum images
export const FULL_RESOLUTION_ATTRIBUTE = "file";

export const SKIPPED_CLASS_FRAGMENTS: ReadonlyArray<string> = [
  "swi-block",
  "steam-info-wrapper",
  "tip",
  "steam-info-loading",
  "original_text_style1",
];

// Inline style fragments that mark the caption rendered under a storefront widget
export const CAPTION_STYLE_FRAGMENTS: ReadonlyArray<string> = ["font-size: 10px", "overflow: visible"];

export const HEADING_TAGS: ReadonlyArray<string> = ["h1", "h2", "h3", "h4", "h5", "h6"];
export const IGNORED_TAGS: ReadonlyArray<string> = ["script", "style", "noscript"];

// Regex
export const REGEX_DATA_URI = /^data:/i;
export const REGEX_SCRIPT_HREF = /javascript:/i;
export const REGEX_ABSOLUTE_URL = /^https?:/i;
export const REGEX_THREAD_ID = /(?:thread-(\d+)-|[?&]tid=(\d+))/;
export const REGEX_POST_TIME = /^(\d{4})-(\d{1,2})-(\d{1,2})\s+(\d{1,2}):(\d{1,2})(?::(\d{1,2}))?$/;
export const REGEX_TIMESTAMP = /^\d+$/;
export const REGEX_LOGIN_PAGE = /登录/;

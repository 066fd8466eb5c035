import { REGEX_ABSOLUTE_URL, REGEX_DATA_URI } from "../constants.js";

/**
 * Resolves a possibly relative reference against the forum base URL.
 * Absolute http(s) references pass through unchanged; anything else is joined onto the base.
 */
export function resolveUrl(baseUrl: string, ref: string): string {
  if (REGEX_ABSOLUTE_URL.test(ref)) {
    return ref;
  }
  const base = baseUrl.replace(/\/+$/, "");
  return ref.startsWith("/") ? base + ref : `${base}/${ref}`;
}

export function isDataUri(ref: string): boolean {
  return REGEX_DATA_URI.test(ref.trim());
}

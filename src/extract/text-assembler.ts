const REGEX_BLANK_LINE_RUN = /\n\s*\n/g;
const REGEX_HORIZONTAL_SPACE_RUN = /[ \t]+/g;

/**
 * Joins extracted fragments into the final post text.
 *
 * Fragments are separated by one space, runs of blank lines shrink to a single blank line,
 * runs of spaces/tabs shrink to one space and the ends are trimmed. Applying it again to its
 * own output changes nothing.
 */
export function assembleText(fragments: ReadonlyArray<string>): string {
  return fragments
    .join(" ")
    .replace(REGEX_BLANK_LINE_RUN, "\n\n")
    .replace(REGEX_HORIZONTAL_SPACE_RUN, " ")
    .trim();
}

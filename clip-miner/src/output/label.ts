/**
 * Text clean-up for identity labels ("Artist - Title").
 *
 * Labels arrive from captions, relay metadata and recognizers, and end up as
 * directory names and catalog queries.
 */

const HASHTAG = /#[\p{L}\p{N}_]+/gu;
const MENTION = /@[\p{L}\p{N}_.]+/gu;
const BRACKETED = /\[[^\]]*\]/g;
const PARENTHESIZED = /\([^)]*\)/g;
// Anything but letters, digits, whitespace and , . ' - _
const DISALLOWED = /[^\p{L}\p{N}\s,.'_-]/gu;

/** Characters not allowed in FAT32/NTFS/ext filenames, plus control chars */
const ILLEGAL_FILENAME_CHARS = /[<>:"/\\|?*\u0000-\u001f]/g;
const MAX_FILENAME_LENGTH = 120;

/**
 * Clean a label for use as an identity.
 * - Removes #hashtags and @mentions
 * - Removes [bracketed] and (parenthetical) annotations
 * - Drops emoji and other symbols
 * - Collapses whitespace
 *
 * Examples:
 *   "Artist A - Song X (Official Video)" -> "Artist A - Song X"
 *   "#fyp Song X @someone [HD]"          -> "Song X"
 */
export function cleanLabel(text: string): string {
  return text
    .replace(HASHTAG, "")
    .replace(MENTION, "")
    .replace(BRACKETED, "")
    .replace(PARENTHESIZED, "")
    .replace(DISALLOWED, "")
    .split(/\s+/)
    .filter(Boolean)
    .join(" ")
    .replace(/^[\s,.'_-]+|[\s,_-]+$/g, "");
}

/**
 * Make a label safe as a single path segment on any common filesystem.
 * Trailing dots and spaces are removed (rejected on Windows).
 */
export function sanitizeFilename(name: string): string {
  const collapsed = name.replace(ILLEGAL_FILENAME_CHARS, "").replace(/\s+/g, " ").trim();
  // Cut on code points so a surrogate pair is never split
  const cleaned = Array.from(collapsed).slice(0, MAX_FILENAME_LENGTH).join("").replace(/[. ]+$/, "");
  return cleaned.length > 0 ? cleaned : "untitled";
}

/**
 * Join artist and title as "Artist - Title".
 * Returns whichever part is present when the other is missing.
 */
export function composeLabel(artist: string | undefined, title: string | undefined): string | undefined {
  if (artist && title) return `${artist} - ${title}`;
  return title ?? artist;
}

/**
 * Split "Artist - Title" at the first separator.
 * A label without a separator is treated as a bare title.
 */
export function splitLabel(label: string): { artist?: string; title: string } {
  const separator = label.indexOf(" - ");
  if (separator < 0) {
    return { title: label.trim() };
  }
  const artist = label.slice(0, separator).trim();
  const title = label.slice(separator + 3).trim();
  if (!artist) return { title };
  if (!title) return { title: artist };
  return { artist, title };
}

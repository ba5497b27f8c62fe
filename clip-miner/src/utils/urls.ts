/**
 * URL extraction from pasted text and chat exports.
 */

const URL_PATTERN = /https?:\/\/[^\s<>"']+/gi;
// Sentence punctuation glued to a link in chat text
const TRAILING_PUNCTUATION = /^[.,;:!?>'"]$/;
const OPENING_BRACKET: Record<string, string> = { ")": "(", "]": "[", "}": "{" };

/** Whether host is one of the domains or a subdomain of one */
export function isKnownHost(host: string, knownDomains: string[]): boolean {
  const normalized = host.toLowerCase().replace(/\.$/, "");
  return knownDomains.some((domain) => {
    const d = domain.toLowerCase();
    return normalized === d || normalized.endsWith(`.${d}`);
  });
}

/**
 * Extract supported URLs in order of first appearance, without duplicates.
 */
export function extractUrls(text: string, knownDomains: string[]): string[] {
  const seen = new Set<string>();
  const urls: string[] = [];

  for (const match of text.matchAll(URL_PATTERN)) {
    const candidate = trimTrailing(match[0]);

    let parsed: URL;
    try {
      parsed = new URL(candidate);
    } catch {
      continue;
    }

    if (!isKnownHost(parsed.hostname, knownDomains) || seen.has(candidate)) {
      continue;
    }
    seen.add(candidate);
    urls.push(candidate);
  }

  return urls;
}

/**
 * Strip trailing punctuation. A closing bracket stays when the URL opens
 * one to match it, as in ".../wiki/Song_(film)".
 */
function trimTrailing(text: string): string {
  let url = text;
  for (;;) {
    const last = url.slice(-1);
    const opening = OPENING_BRACKET[last];
    if (opening !== undefined) {
      if (countOf(url, last) <= countOf(url, opening)) {
        return url;
      }
    } else if (!TRAILING_PUNCTUATION.test(last)) {
      return url;
    }
    url = url.slice(0, -1);
  }
}

function countOf(text: string, char: string): number {
  return text.split(char).length - 1;
}

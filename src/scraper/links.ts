/**
 * Link extraction and scrapeability checks
 */

const URL_PATTERN = /https?:\/\/[^\s<>"'`]+/gi;

// Sentence punctuation glued to the end of a link
const TRAILING_PUNCTUATION = /[.,;:!?)\]}>»”’]+$/;

/**
 * Hosts whose pages need script execution or a login to show any content
 */
export const NON_SCRAPEABLE_DOMAINS = [
  'youtube.com',
  'youtu.be',
  'x.com',
  'twitter.com',
  'instagram.com',
  'tiktok.com',
  'facebook.com',
  'threads.net',
  't.me',
] as const;

/**
 * All http(s) links in a text, in first-seen order, without duplicates
 */
export function extractLinks(text: string): string[] {
  const links: string[] = [];

  for (const match of text.matchAll(URL_PATTERN)) {
    const link = match[0].replace(TRAILING_PUNCTUATION, '');
    if (link.length > 'https://'.length && !links.includes(link)) {
      links.push(link);
    }
  }

  return links;
}

export function isScrapeableUrl(url: string): boolean {
  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return false;
  }

  return !NON_SCRAPEABLE_DOMAINS.some(
    (domain) => hostname === domain || hostname.endsWith(`.${domain}`)
  );
}

import type { LinkRecord } from "./types.js";

const LINK_PATTERN = /\[(.+?)\]\((.+?)\)/g;

/**
 * Extract markdown links from the added lines of a unified diff.
 * Removed and context lines are ignored, as is the `+++` file header.
 */
export function parseLinksFromDiff(diffText: string): LinkRecord[] {
  const links: LinkRecord[] = [];

  for (const line of diffText.split(/\r?\n/)) {
    if (!line.startsWith("+") || line.startsWith("+++")) {
      continue;
    }

    const content = line.slice(1).trim();
    for (const match of content.matchAll(LINK_PATTERN)) {
      links.push({ title: match[1].trim(), url: match[2].trim() });
    }
  }

  return links;
}

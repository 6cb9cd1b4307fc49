import { z } from "zod";

import { FetchError, errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { htmlToMarkdown } from "./markdown.js";

export const USER_AGENT = "BookmarkArchiver/1.0";

const READER_TIMEOUT_MS = 60_000;
// Browser rendering can take minutes for heavy pages
const RENDER_TIMEOUT_MS = 600_000;
const READER_CONTENT_MARKER = "Markdown Content:\n";
const CLOUDFLARE_API_BASE = "https://api.cloudflare.com/client/v4";

export interface FetchOptions {
  /** Hosts that need browser rendering (matched exactly or as a parent domain) */
  renderHosts: string[];
  /** Reader service prefix; the article URL is appended to it */
  readerBaseUrl: string;
  cloudflareAccountId?: string;
  cloudflareApiToken?: string;
  logger?: Logger;
}

export type FetchStrategy = "render" | "reader";

const renderResponseSchema = z.object({
  success: z.boolean(),
  result: z.string().optional(),
  errors: z.array(z.unknown()).optional(),
});

function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}

/**
 * Choose how to fetch a URL: hosts listed in `renderHosts` (or their
 * subdomains) go through browser rendering, everything else through the
 * reader service.
 */
export function selectStrategy(url: string, renderHosts: string[]): FetchStrategy {
  const host = hostOf(url);
  if (host === null) {
    return "reader";
  }
  return renderHosts.some((h) => host === h || host.endsWith(`.${h}`)) ? "render" : "reader";
}

async function request(url: string, init: RequestInit, timeoutMs: number, articleUrl: string): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw new FetchError(`Request failed: ${errorMessage(error)}`, articleUrl, undefined, { cause: error });
  }

  if (!response.ok) {
    const body = await response.text().catch(() => "");
    throw new FetchError(`HTTP ${response.status}: ${body.slice(0, 200)}`, articleUrl, response.status);
  }

  return response;
}

/**
 * Fetch an article as Markdown through the reader service
 */
export async function fetchWithReader(url: string, options: FetchOptions): Promise<string> {
  const logger = options.logger ?? silentLogger;
  logger.debug("Requesting reader", { url, readerBaseUrl: options.readerBaseUrl });

  const response = await request(
    `${options.readerBaseUrl}${url}`,
    { headers: { Accept: "text/plain", "User-Agent": USER_AGENT } },
    READER_TIMEOUT_MS,
    url
  );
  const text = await response.text();

  const markerIndex = text.indexOf(READER_CONTENT_MARKER);
  if (markerIndex === -1) {
    logger.warn("Reader response has no 'Markdown Content:' section, using full body", { url });
    return text.trim();
  }

  return text.slice(markerIndex + READER_CONTENT_MARKER.length).trim();
}

/**
 * Fetch an article by rendering it in Cloudflare's browser rendering
 * service and converting the HTML to Markdown
 */
export async function fetchWithRenderer(url: string, options: FetchOptions): Promise<string> {
  const logger = options.logger ?? silentLogger;
  const { cloudflareAccountId, cloudflareApiToken } = options;

  if (!cloudflareAccountId || !cloudflareApiToken) {
    throw new FetchError(
      "CLOUDFLARE_ACCOUNT_ID and CLOUDFLARE_API_TOKEN are required to fetch this URL",
      url
    );
  }

  logger.debug("Requesting browser rendering", { url });

  const response = await request(
    `${CLOUDFLARE_API_BASE}/accounts/${cloudflareAccountId}/browser-rendering/content`,
    {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${cloudflareApiToken}`,
      },
      body: JSON.stringify({ url }),
    },
    RENDER_TIMEOUT_MS,
    url
  );

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new FetchError("Browser rendering returned invalid JSON", url, undefined, { cause: error });
  }

  const parsed = renderResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new FetchError("Browser rendering returned an unexpected response", url);
  }

  if (!parsed.data.success || parsed.data.result === undefined) {
    throw new FetchError(`Browser rendering failed: ${JSON.stringify(parsed.data.errors ?? [])}`, url);
  }

  return htmlToMarkdown(parsed.data.result);
}

/**
 * Fetch an article's content as Markdown using the strategy for its URL.
 * Throws FetchError on any failure, including an empty result.
 */
export async function fetchArticleContent(url: string, options: FetchOptions): Promise<string> {
  const strategy = selectStrategy(url, options.renderHosts);
  options.logger?.info(strategy === "render" ? "Fetching with browser rendering" : "Fetching with reader");

  const content =
    strategy === "render" ? await fetchWithRenderer(url, options) : await fetchWithReader(url, options);

  if (!content) {
    throw new FetchError("Fetched content is empty", url);
  }

  return content;
}

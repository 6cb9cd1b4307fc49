import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { ArchiveEntry, LinkOutcome, LinkRecord, Placement, RunReport } from "./types.js";

/**
 * Collaborators for one pass over the extracted links
 */
export interface ProcessorDeps {
  fetchContent(url: string, logger: Logger): Promise<string>;
  summarize(content: string): Promise<string>;
  classify(title: string, summary: string, categories: readonly string[]): Promise<string>;
  archive(category: string, entry: ArchiveEntry): Promise<Placement>;
  logger: Logger;
}

type Stage = Extract<LinkOutcome, { status: "failed" }>["stage"];

class StageError extends Error {
  constructor(
    public readonly stage: Stage,
    cause: unknown
  ) {
    super(errorMessage(cause), { cause });
    this.name = "StageError";
  }
}

async function stage<T>(name: Stage, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    throw new StageError(name, error);
  }
}

async function processLink(
  link: LinkRecord,
  categories: string[],
  deps: ProcessorDeps,
  logger: Logger
): Promise<LinkOutcome> {
  try {
    const content = await stage("fetch", () => deps.fetchContent(link.url, logger));
    logger.info("Fetched content", { length: content.length });

    const summary = await stage("summarize", () => deps.summarize(content));
    logger.info("Summary generated", { summary });

    const category = await stage("classify", () => deps.classify(link.title, summary, categories));
    logger.info("Category chosen", { category });

    const placement = await stage("archive", () =>
      deps.archive(category, { title: link.title, url: link.url, summary })
    );

    // Later links must be able to pick a category created by this one
    if (!categories.includes(category)) {
      categories.push(category);
    }

    logger.info("Archived", { category, placement });
    return { link, status: "archived", category, placement };
  } catch (error) {
    if (!(error instanceof StageError)) {
      throw error;
    }
    logger.error(`Skipping link: ${error.stage} failed`, { error: error.message });
    return { link, status: "failed", stage: error.stage, error: error.message };
  }
}

/**
 * Fetch, summarize, classify and archive each link, one at a time and in
 * order. `categories` is updated in place as new categories are created.
 * A failing link is logged and skipped; it never stops the run.
 */
export async function processLinks(
  links: LinkRecord[],
  categories: string[],
  deps: ProcessorDeps
): Promise<RunReport> {
  const outcomes: LinkOutcome[] = [];

  for (const [index, link] of links.entries()) {
    const linkLogger = deps.logger.child({ link: `${index + 1}/${links.length}`, url: link.url });
    linkLogger.info("Processing link", { title: link.title });
    outcomes.push(await processLink(link, categories, deps, linkLogger));
  }

  const archived = outcomes.filter((o) => o.status === "archived").length;

  return {
    total: links.length,
    archived,
    failed: outcomes.length - archived,
    outcomes,
  };
}

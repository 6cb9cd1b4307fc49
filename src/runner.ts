import { resolve } from "node:path";

import { archiveEntry, type InsertOptions } from "./archive.js";
import { getLLMProvider, getRenderHosts, type Config } from "./config.js";
import { readCategories } from "./document.js";
import { fetchArticleContent } from "./fetcher.js";
import { getLastChangeDiff, type GitRunner } from "./git.js";
import { parseLinksFromDiff } from "./links.js";
import type { Logger } from "./logger.js";
import { processLinks, type ProcessorDeps } from "./processor.js";
import { classifyArticle, createProvider, summarizeArticle } from "./summarizer.js";
import type { LLMProvider, RunReport } from "./types.js";

export interface RunOptions {
  logger: Logger;
  /** Replaces the provider built from configuration */
  provider?: LLMProvider;
  git?: GitRunner;
  insertOptions?: Pick<InsertOptions, "pickMarker">;
}

/**
 * Build the per-link collaborators from configuration
 */
export function createDeps(config: Config, archivePath: string, options: RunOptions): ProcessorDeps {
  const provider = options.provider ?? createProvider(config);
  const renderHosts = getRenderHosts(config);
  const insertOptions: InsertOptions = {
    title: config.archiveTitle,
    newCategoryLevel: config.newCategoryLevel,
    ...options.insertOptions,
  };

  return {
    fetchContent: (url, logger) =>
      fetchArticleContent(url, {
        renderHosts,
        readerBaseUrl: config.readerBaseUrl,
        cloudflareAccountId: config.cloudflareAccountId,
        cloudflareApiToken: config.cloudflareApiToken,
        logger,
      }),
    summarize: (content) => summarizeArticle(provider, content, config.summaryLanguage),
    classify: (title, summary, categories) => classifyArticle(provider, title, summary, categories),
    archive: async (category, entry) => (await archiveEntry(archivePath, category, entry, insertOptions)).placement,
    logger: options.logger,
  };
}

/**
 * Archive the links added by the bookmark list's last change.
 * Returns null when there is no diff to work from.
 */
export async function run(config: Config, options: RunOptions): Promise<RunReport | null> {
  const { logger } = options;
  const archivePath = resolve(config.repoPath, config.categoryFile);

  logger.info("Starting bookmark archiver", {
    inputFile: config.inputFile,
    categoryFile: config.categoryFile,
    model: getLLMProvider(config) === "openai-compatible" ? config.llmModel : config.anthropicModel,
  });

  const diff = await getLastChangeDiff(config.inputFile, config.repoPath, { git: options.git, logger });
  if (!diff.ok) {
    logger.warn("No diff available, nothing to archive", { reason: diff.reason });
    return null;
  }

  const links = parseLinksFromDiff(diff.diff);
  if (links.length === 0) {
    logger.info("No new markdown links in this change");
    return { total: 0, archived: 0, failed: 0, outcomes: [] };
  }
  logger.info(`Found ${links.length} new links`);

  const categories = await readCategories(archivePath, logger);
  if (categories.length > 0) {
    logger.info(`Found ${categories.length} existing categories`, { categories });
  } else {
    logger.info("No existing categories, the model will create them");
  }

  const report = await processLinks(links, categories, createDeps(config, archivePath, options));

  logger.info("All links processed", {
    total: report.total,
    archived: report.archived,
    failed: report.failed,
  });

  return report;
}

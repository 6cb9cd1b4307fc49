import { config as loadEnv } from "dotenv";
import { z } from "zod";

import { ConfigMissingError } from "./errors.js";

const configSchema = z
  .object({
    // LLM - an OpenAI-compatible endpoint or Anthropic must be provided
    llmApiUrl: z.string().url().optional(),
    openaiApiKey: z.string().min(1).optional(),
    llmModel: z.string().min(1).default("deepseek-ai/DeepSeek-R1-0528-Qwen3-8B"),
    anthropicApiKey: z.string().min(1).optional(),
    anthropicModel: z.string().min(1).default("claude-haiku-4-5"),
    summaryLanguage: z.string().min(1).default("English"),

    // Content fetching
    cloudflareAccountId: z.string().min(1).optional(),
    cloudflareApiToken: z.string().min(1).optional(),
    renderHosts: z.string().default("mp.weixin.qq.com"),
    readerBaseUrl: z.string().url().default("https://r.jina.ai/"),

    // Files
    repoPath: z.string().min(1).default("."),
    inputFile: z.string().min(1).default("README.md"),
    categoryFile: z.string().min(1).default("category.md"),
    archiveTitle: z.string().min(1).default("# Bookmark Archive"),
    newCategoryLevel: z.enum(["major", "minor"]).default("minor"),

    // Logging
    logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
    logFormat: z.enum(["text", "json"]).default("text"),
  })
  .refine((data) => (data.llmApiUrl && data.openaiApiKey) || data.anthropicApiKey, {
    message: "Either LLM_API_URL and OPENAI_API_KEY, or ANTHROPIC_API_KEY must be provided",
  });

export type Config = z.infer<typeof configSchema>;

/**
 * Treat empty variables (e.g. unset CI secrets) as missing
 */
function read(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Validate configuration from the environment.
 * Throws ConfigMissingError listing every problem found.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse({
    llmApiUrl: read(env, "LLM_API_URL"),
    openaiApiKey: read(env, "OPENAI_API_KEY"),
    llmModel: read(env, "LLM_MODEL_NAME"),
    anthropicApiKey: read(env, "ANTHROPIC_API_KEY"),
    anthropicModel: read(env, "ANTHROPIC_MODEL"),
    summaryLanguage: read(env, "SUMMARY_LANGUAGE"),
    cloudflareAccountId: read(env, "CLOUDFLARE_ACCOUNT_ID"),
    cloudflareApiToken: read(env, "CLOUDFLARE_API_TOKEN"),
    renderHosts: read(env, "RENDER_HOSTS"),
    readerBaseUrl: read(env, "READER_BASE_URL"),
    repoPath: read(env, "GIT_REPO_PATH"),
    inputFile: read(env, "INPUT_FILE"),
    categoryFile: read(env, "CATEGORY_FILE"),
    archiveTitle: read(env, "ARCHIVE_TITLE"),
    newCategoryLevel: read(env, "NEW_CATEGORY_LEVEL"),
    logLevel: read(env, "LOG_LEVEL"),
    logFormat: read(env, "LOG_FORMAT"),
  });

  if (!result.success) {
    throw new ConfigMissingError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }

  return result.data;
}

/**
 * Load `.env` into process.env, then validate
 */
export function loadConfigFromEnvironment(): Config {
  loadEnv();
  return loadConfig(process.env);
}

/**
 * Get render hosts as an array
 */
export function getRenderHosts(config: Pick<Config, "renderHosts">): string[] {
  return config.renderHosts
    .split(",")
    .map((h) => h.trim().toLowerCase())
    .filter(Boolean);
}

/**
 * Determine which LLM provider to use
 */
export function getLLMProvider(config: Config): "openai-compatible" | "anthropic" {
  return config.llmApiUrl && config.openaiApiKey ? "openai-compatible" : "anthropic";
}

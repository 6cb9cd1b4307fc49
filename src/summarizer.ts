import Anthropic from "@anthropic-ai/sdk";
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { getLLMProvider, type Config } from "./config.js";
import { ClassifyError, SummarizeError, errorMessage } from "./errors.js";
import type { CompletionRequest, LLMProvider } from "./types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = join(__dirname, "..", "prompts");

// Slow self-hosted models can take minutes on long articles
const LLM_TIMEOUT_MS = 600_000;
const CONTENT_MAX_LENGTH = 12000; // Truncate long content
const SUMMARY_MAX_TOKENS = 4096;
const CATEGORY_MAX_TOKENS = 1024;

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      })
    )
    .min(1),
});

/**
 * Load prompt template from file
 */
function loadPrompt(name: string): string {
  const path = join(PROMPTS_DIR, `${name}.txt`);
  return readFileSync(path, "utf-8").trim();
}

/**
 * Fill `{{NAME}}` placeholders in a template
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match: string, key: string) => values[key] ?? match);
}

/**
 * Provider for any endpoint speaking the OpenAI chat completions protocol
 */
export class OpenAICompatibleProvider implements LLMProvider {
  constructor(
    private readonly apiUrl: string,
    private readonly apiKey: string,
    private readonly model: string
  ) {}

  async complete(request: CompletionRequest): Promise<string> {
    const response = await fetch(this.apiUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user },
        ],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      }),
      signal: AbortSignal.timeout(LLM_TIMEOUT_MS),
    });

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new Error(`LLM API error ${response.status}: ${body.slice(0, 200)}`);
    }

    const parsed = chatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error("Unexpected response format from LLM API");
    }

    return parsed.data.choices[0].message.content;
  }
}

/**
 * Anthropic/Claude LLM provider
 */
export class AnthropicProvider implements LLMProvider {
  private client: Anthropic;

  constructor(
    apiKey: string,
    private readonly model: string
  ) {
    this.client = new Anthropic({ apiKey, timeout: LLM_TIMEOUT_MS, maxRetries: 0 });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      system: request.system,
      messages: [{ role: "user", content: request.user }],
    });

    const content = response.content[0];
    if (content?.type === "text") {
      return content.text;
    }

    throw new Error("Unexpected response type from Anthropic");
  }
}

/**
 * Create LLM provider based on configuration
 */
export function createProvider(config: Config): LLMProvider {
  if (getLLMProvider(config) === "openai-compatible" && config.llmApiUrl && config.openaiApiKey) {
    return new OpenAICompatibleProvider(config.llmApiUrl, config.openaiApiKey, config.llmModel);
  }

  if (config.anthropicApiKey) {
    return new AnthropicProvider(config.anthropicApiKey, config.anthropicModel);
  }

  throw new Error("No LLM provider configured");
}

/**
 * Truncate content to max length, preferring beginning and end
 */
export function truncateContent(content: string, maxLength: number = CONTENT_MAX_LENGTH): string {
  if (content.length <= maxLength) {
    return content;
  }

  const halfLength = Math.floor(maxLength / 2) - 50;
  const start = content.slice(0, halfLength);
  const end = content.slice(-halfLength);

  return `${start}\n\n[... content truncated ...]\n\n${end}`;
}

/**
 * Remove reasoning blocks that some models emit before the answer
 */
export function stripReasoning(text: string): string {
  return text.replace(/<think>[\s\S]*?<\/think>/gi, "").trim();
}

/**
 * Normalize a category name returned by the model. Only the first non-empty
 * line counts; anything after it is commentary.
 */
export function cleanCategory(text: string): string {
  const lines = stripReasoning(text)
    .split(/\r?\n/)
    .map((line) => line.replace(/^[#*"\s]+|[#*"\s]+$/g, ""));

  return lines.find((line) => line !== "") ?? "";
}

/**
 * Summarize an article's Markdown content.
 * Throws SummarizeError when the model fails or answers with nothing.
 */
export async function summarizeArticle(
  provider: LLMProvider,
  content: string,
  language: string = "English"
): Promise<string> {
  let response: string;
  try {
    response = await provider.complete({
      system: fillTemplate(loadPrompt("summarize"), { LANGUAGE: language }),
      user: truncateContent(content),
      temperature: 0.3,
      maxTokens: SUMMARY_MAX_TOKENS,
    });
  } catch (error) {
    throw new SummarizeError(`Summarization request failed: ${errorMessage(error)}`, { cause: error });
  }

  const summary = stripReasoning(response);
  if (!summary) {
    throw new SummarizeError("Model returned an empty summary");
  }

  return summary;
}

/**
 * Pick a category for an article. The model may choose one of `categories`
 * or invent a new name.
 * Throws ClassifyError when the model fails or answers with nothing.
 */
export async function classifyArticle(
  provider: LLMProvider,
  title: string,
  summary: string,
  categories: readonly string[]
): Promise<string> {
  const user = fillTemplate(loadPrompt("classify-user"), {
    CATEGORIES: categories.map((c) => `- ${c}`).join("\n"),
    TITLE: title,
    SUMMARY: summary,
  });

  let response: string;
  try {
    response = await provider.complete({
      system: loadPrompt("classify"),
      user,
      temperature: 0.1,
      maxTokens: CATEGORY_MAX_TOKENS,
    });
  } catch (error) {
    throw new ClassifyError(`Classification request failed: ${errorMessage(error)}`, { cause: error });
  }

  const category = cleanCategory(response);
  if (!category) {
    throw new ClassifyError("Model returned an empty category");
  }

  return category;
}

/**
 * Markdown link found on an added line of the bookmark list diff
 */
export interface LinkRecord {
  title: string;
  url: string;
}

/**
 * Article record written into the archive
 */
export interface ArchiveEntry {
  title: string;
  url: string;
  summary: string;
}

/**
 * Heading tier of a category. `major` is `##`, `minor` is `###`.
 */
export type HeadingLevel = "major" | "minor";

export type LineKind = "major-heading" | "minor-heading" | "entry-start" | "blank" | "other";

/**
 * Where an insertion landed in the archive
 */
export type Placement = "prepended" | "appended-to-empty" | "created-category";

/**
 * Supplies the decorative marker put in front of a new category's name
 */
export type MarkerProvider = () => string;

/**
 * Result of reading the bookmark list's last change from git
 */
export type DiffResult =
  | { ok: true; diff: string; newer: string; older: string }
  | { ok: false; reason: "not-a-repository" | "insufficient-history" | "command-failed"; detail?: string };

/**
 * LLM provider interface for abstraction
 */
export interface LLMProvider {
  complete(request: CompletionRequest): Promise<string>;
}

export interface CompletionRequest {
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
}

/**
 * Outcome of processing a single link
 */
export type LinkOutcome =
  | { link: LinkRecord; status: "archived"; category: string; placement: Placement }
  | { link: LinkRecord; status: "failed"; stage: "fetch" | "summarize" | "classify" | "archive"; error: string };

/**
 * Summary of a complete run
 */
export interface RunReport {
  total: number;
  archived: number;
  failed: number;
  outcomes: LinkOutcome[];
}

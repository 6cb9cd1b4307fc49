import { readFile } from "node:fs/promises";

import { errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { HeadingLevel, LineKind } from "./types.js";

/**
 * An archive document: each record is one line's exact text including its
 * `\n` terminator. Only the last record may lack a terminator.
 */
export type DocumentLines = readonly string[];

export const ENTRY_LABELS = {
  title: "**Title:**",
  link: "**Link:**",
  summary: "**Summary:**",
} as const;

export const HEADING_PREFIX: Record<HeadingLevel, string> = {
  major: "## ",
  minor: "### ",
};

/**
 * Title labels that start an entry block. Archives written with Chinese
 * labels (`**标题:**`) keep working alongside the English ones.
 */
export const ENTRY_TITLE_LABELS: readonly string[] = [ENTRY_LABELS.title, "**标题:**"];

const LINE_PATTERN = /[^\n]*\n|[^\n]+$/g;

/**
 * Split text into line records. `joinLines(splitLines(text)) === text`.
 */
export function splitLines(text: string): string[] {
  return text.match(LINE_PATTERN) ?? [];
}

export function joinLines(lines: DocumentLines): string {
  return lines.join("");
}

export function classifyLine(line: string): LineKind {
  const stripped = line.trim();

  if (stripped === "") return "blank";
  if (stripped.startsWith(HEADING_PREFIX.major)) return "major-heading";
  if (stripped.startsWith(HEADING_PREFIX.minor)) return "minor-heading";
  if (ENTRY_TITLE_LABELS.some((label) => stripped.startsWith(label))) return "entry-start";
  return "other";
}

export function isHeading(kind: LineKind): boolean {
  return kind === "major-heading" || kind === "minor-heading";
}

/**
 * Category name of a heading line, or null for any other line.
 *
 * The text after the `#` run is split at its first whitespace run and the
 * last part is the name: `## 🧩 AI Tools` names "AI Tools", `## Tech` names
 * "Tech".
 */
export function headingName(line: string): string | null {
  if (!isHeading(classifyLine(line))) {
    return null;
  }

  const content = line.trim().replace(/^#+/, "").trim();
  const match = /^\S+\s+([\s\S]+)$/.exec(content);

  return match ? match[1] : content;
}

/**
 * Category names of every heading, in document order. Duplicates are kept.
 */
export function parseCategories(lines: DocumentLines): string[] {
  const categories: string[] = [];

  for (const line of lines) {
    const name = headingName(line);
    if (name !== null) {
      categories.push(name);
    }
  }

  return categories;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Read an archive's lines, or null when the file does not exist yet.
 * Other read errors propagate.
 */
export async function readDocument(path: string): Promise<string[] | null> {
  try {
    return splitLines(await readFile(path, "utf-8"));
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Parse the categories of the archive at `path`.
 * A missing archive has no categories yet; an unreadable one is logged and
 * treated the same way.
 */
export async function readCategories(path: string, logger: Logger = silentLogger): Promise<string[]> {
  try {
    const lines = await readDocument(path);
    return lines ? parseCategories(lines) : [];
  } catch (error) {
    logger.error("Failed to read archive categories", { path, error: errorMessage(error) });
    return [];
  }
}

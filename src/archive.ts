import { randomBytes } from "node:crypto";
import { rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

import {
  ENTRY_LABELS,
  HEADING_PREFIX,
  classifyLine,
  headingName,
  isHeading,
  joinLines,
  readDocument,
  splitLines,
  type DocumentLines,
} from "./document.js";
import { ArchiveIoError, errorMessage } from "./errors.js";
import type { ArchiveEntry, HeadingLevel, MarkerProvider, Placement } from "./types.js";

export const DEFAULT_ARCHIVE_TITLE = "# Bookmark Archive";
export const CATEGORY_MARKERS = ["🧩", "🔧", "💡", "📚", "🧭", "✨"] as const;

export interface InsertOptions {
  /** Title line of a newly created archive (default: "# Bookmark Archive") */
  title?: string;
  /** Heading tier for new categories (default: "minor") */
  newCategoryLevel?: HeadingLevel;
  /** Marker for new category headings (default: random pick from CATEGORY_MARKERS) */
  pickMarker?: MarkerProvider;
}

export interface InsertResult {
  lines: string[];
  placement: Placement;
}

export const randomMarker: MarkerProvider = () =>
  CATEGORY_MARKERS[Math.floor(Math.random() * CATEGORY_MARKERS.length)];

function singleLine(text: string): string {
  return text.trim().replace(/\s*\n\s*/g, " ");
}

/**
 * Render an entry as line records: title, link and summary separated by
 * blank lines, every line terminated. Field values are folded onto one line
 * so a summary can never start a heading.
 */
export function formatEntry(entry: ArchiveEntry): string[] {
  return splitLines(
    `${ENTRY_LABELS.title} ${singleLine(entry.title)}\n\n` +
      `${ENTRY_LABELS.link} ${singleLine(entry.url)}\n\n` +
      `${ENTRY_LABELS.summary} ${singleLine(entry.summary)}\n`
  );
}

function findCategoryHeading(lines: DocumentLines, category: string): number {
  return lines.findIndex((line) => headingName(line) === category);
}

/**
 * First entry line of the section under `headingIndex`, or -1 when the next
 * heading (or the end of the document) comes first.
 */
function findFirstEntry(lines: DocumentLines, headingIndex: number): number {
  for (let i = headingIndex + 1; i < lines.length; i++) {
    const kind = classifyLine(lines[i]);
    if (kind === "entry-start") return i;
    if (isHeading(kind)) return -1;
  }
  return -1;
}

/**
 * End of the section under `headingIndex`: the next heading of either depth
 */
function findSectionEnd(lines: DocumentLines, headingIndex: number): number {
  for (let i = headingIndex + 1; i < lines.length; i++) {
    if (isHeading(classifyLine(lines[i]))) return i;
  }
  return lines.length;
}

function isTerminated(line: string): boolean {
  return line.endsWith("\n");
}

/**
 * Copy of `lines` whose last record is terminated
 */
function terminated(lines: DocumentLines): string[] {
  const copy = [...lines];
  const last = copy.length - 1;
  if (last >= 0 && !isTerminated(copy[last])) {
    copy[last] = `${copy[last]}\n`;
  }
  return copy;
}

/**
 * Insert an entry under `category` and return the new document.
 *
 * - existing category with entries: the entry goes first, followed by a
 *   `---` separator
 * - existing category without entries: the entry goes at the end of the
 *   section
 * - unknown category: a new section is appended at the end
 *
 * `lines` is null when the archive does not exist yet. The input is never
 * modified; every line outside the inserted span is kept verbatim. A
 * multi-line category is folded onto one line like the entry fields.
 */
export function insertEntry(
  lines: DocumentLines | null,
  rawCategory: string,
  entry: ArchiveEntry,
  options: InsertOptions = {}
): InsertResult {
  const { title = DEFAULT_ARCHIVE_TITLE, newCategoryLevel = "minor", pickMarker = randomMarker } = options;
  const document: DocumentLines = lines ?? [`${title}\n`, "\n"];
  const category = singleLine(rawCategory);
  const entryLines = formatEntry(entry);

  const headingIndex = findCategoryHeading(document, category);

  if (headingIndex !== -1) {
    const firstEntry = findFirstEntry(document, headingIndex);

    if (firstEntry !== -1) {
      return {
        lines: [
          ...document.slice(0, firstEntry),
          ...entryLines,
          "\n",
          "---\n",
          "\n",
          ...document.slice(firstEntry),
        ],
        placement: "prepended",
      };
    }

    const sectionEnd = findSectionEnd(document, headingIndex);
    const before = sectionEnd === document.length ? terminated(document) : document.slice(0, sectionEnd);

    return {
      lines: [...before, "\n", ...entryLines, ...document.slice(sectionEnd)],
      placement: "appended-to-empty",
    };
  }

  const prefix = terminated(document);
  const last = prefix[prefix.length - 1];
  if (last !== undefined && classifyLine(last) !== "blank") {
    prefix.push("\n");
  }

  return {
    lines: [...prefix, `${HEADING_PREFIX[newCategoryLevel]}${pickMarker()} ${category}\n`, "\n", ...entryLines],
    placement: "created-category",
  };
}

/**
 * Replace the file at `path` with `content`.
 * The content goes to a sibling temp file first and is renamed over the
 * target, so readers see either the old or the new archive.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const tempPath = join(dirname(path), `.${basename(path)}.${randomBytes(6).toString("hex")}.tmp`);

  try {
    await writeFile(tempPath, content, "utf-8");
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Read the archive, insert the entry, and write the archive back.
 * Throws ArchiveIoError when the archive cannot be read or replaced.
 */
export async function archiveEntry(
  path: string,
  category: string,
  entry: ArchiveEntry,
  options: InsertOptions = {}
): Promise<InsertResult> {
  let lines: string[] | null;
  try {
    lines = await readDocument(path);
  } catch (error) {
    throw new ArchiveIoError(`Failed to read archive: ${errorMessage(error)}`, path, { cause: error });
  }

  const result = insertEntry(lines, category, entry, options);

  try {
    await writeFileAtomic(path, joinLines(result.lines));
  } catch (error) {
    throw new ArchiveIoError(`Failed to write archive: ${errorMessage(error)}`, path, { cause: error });
  }

  return result;
}

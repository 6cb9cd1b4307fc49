import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  classifyLine,
  headingName,
  joinLines,
  parseCategories,
  readCategories,
  splitLines,
} from "../src/document.js";

describe("splitLines / joinLines", () => {
  it("keeps terminators on each line", () => {
    expect(splitLines("a\n\nb\n")).toEqual(["a\n", "\n", "b\n"]);
  });

  it("keeps an unterminated last line", () => {
    expect(splitLines("a\nb")).toEqual(["a\n", "b"]);
  });

  it("returns no lines for empty text", () => {
    expect(splitLines("")).toEqual([]);
  });

  it("round-trips text byte for byte", () => {
    const text = "# Title\r\n\n## 🧩 Tech\n\n**Title:** x\n   \ntrailing";
    expect(joinLines(splitLines(text))).toBe(text);
  });
});

describe("classifyLine", () => {
  it("classifies each kind of line", () => {
    expect(classifyLine("## Tech\n")).toBe("major-heading");
    expect(classifyLine("### Tech\n")).toBe("minor-heading");
    expect(classifyLine("**Title:** Something\n")).toBe("entry-start");
    expect(classifyLine("**标题:** 某篇文章\n")).toBe("entry-start");
    expect(classifyLine("   \n")).toBe("blank");
    expect(classifyLine("**Link:** https://x\n")).toBe("other");
  });

  it("does not treat the document title or deeper headings as categories", () => {
    expect(classifyLine("# Archive\n")).toBe("other");
    expect(classifyLine("#### Deep\n")).toBe("other");
    expect(classifyLine("##NoSpace\n")).toBe("other");
  });

  it("ignores surrounding whitespace", () => {
    expect(classifyLine("  ## Indented  \n")).toBe("major-heading");
  });
});

describe("headingName", () => {
  it("drops a leading decorative marker", () => {
    expect(headingName("## 🧩 AI Tools\n")).toBe("AI Tools");
    expect(headingName("### ✨ Reading\n")).toBe("Reading");
  });

  it("takes the part after the first word", () => {
    expect(headingName("## AI Tools\n")).toBe("Tools");
    expect(headingName("### 1. Intro\n")).toBe("Intro");
    expect(headingName("### Tech\n")).toBe("Tech");
  });

  it("uses the whole text when there is no internal whitespace", () => {
    expect(headingName("## 🧩\n")).toBe("🧩");
  });

  it("returns null for non-heading lines", () => {
    expect(headingName("**Title:** x\n")).toBeNull();
    expect(headingName("# Archive\n")).toBeNull();
    expect(headingName("\n")).toBeNull();
  });

  it("is case-sensitive", () => {
    expect(headingName("## 💡 ai tools\n")).toBe("ai tools");
  });
});

describe("parseCategories", () => {
  it("lists headings of both depths in document order", () => {
    const lines = splitLines(
      "# Archive\n\n## 🧩 Tech\n\n### 🔧 Tools\n\n**Title:** x\n\n## 📚 Reading\n"
    );
    expect(parseCategories(lines)).toEqual(["Tech", "Tools", "Reading"]);
  });

  it("keeps duplicates", () => {
    expect(parseCategories(splitLines("## Tech\n### 🧩 Tech\n"))).toEqual(["Tech", "Tech"]);
  });

  it("returns an empty list for a document without headings", () => {
    expect(parseCategories(splitLines("# Archive\n\nsome text\n"))).toEqual([]);
  });
});

describe("readCategories", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "archive-doc-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns an empty list when the archive does not exist", async () => {
    expect(await readCategories(join(dir, "missing.md"))).toEqual([]);
  });

  it("reads categories from the archive file", async () => {
    const path = join(dir, "category.md");
    await writeFile(path, "# Archive\n\n## 🧭 Travel\n\n### Food\n", "utf-8");
    expect(await readCategories(path)).toEqual(["Travel", "Food"]);
  });

  it("returns an empty list when the path cannot be read as a file", async () => {
    expect(await readCategories(dir)).toEqual([]);
  });
});

import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { loadConfig, type Config } from "../src/config.js";
import type { GitRunner } from "../src/git.js";
import { silentLogger } from "../src/logger.js";
import { run } from "../src/runner.js";
import type { CompletionRequest, LLMProvider } from "../src/types.js";

const NEWER = "b".repeat(40);
const OLDER = "a".repeat(40);

const DIFF = [
  "--- a/README.md",
  "+++ b/README.md",
  "@@ -1,2 +1,4 @@",
  " - [Old](https://old.example)",
  "+- [Rust Tips](https://rust.example/tips)",
  "+- [Broken](https://broken.example)",
  "+- [Trip Notes](https://travel.example/notes)",
].join("\n");

const EXISTING_ARCHIVE = "# Bookmark Archive\n\n## 🔧 Programming\n\n**Title:** Old\n\n**Link:** https://old.example\n\n**Summary:** Old summary\n";

/**
 * Answers summary requests with a fixed text and classification requests
 * by keyword, so each link lands in a predictable category
 */
function keywordProvider(): LLMProvider & { requests: CompletionRequest[] } {
  const requests: CompletionRequest[] = [];
  return {
    requests,
    async complete(request) {
      requests.push(request);
      if (request.temperature === 0.3) {
        return `Summary of ${request.user}`;
      }
      return request.user.includes("Trip Notes") ? "Travel" : "Programming";
    },
  };
}

describe("run", () => {
  let dir: string;
  let config: Config;
  const mockFetch = vi.fn<typeof fetch>();

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "run-"));
    await mkdir(join(dir, ".git"));
    config = loadConfig({
      ANTHROPIC_API_KEY: "test-anthropic",
      GIT_REPO_PATH: dir,
      READER_BASE_URL: "https://reader.example/",
    });

    mockFetch.mockReset();
    mockFetch.mockImplementation(async (input) => {
      const url = String(input);
      if (url.includes("broken.example")) {
        return new Response("gone", { status: 404 });
      }
      return new Response(`Markdown Content:\nbody of ${url.slice("https://reader.example/".length)}`);
    });
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(dir, { recursive: true, force: true });
  });

  it("archives new links and skips failures", async () => {
    await writeFile(join(dir, "category.md"), EXISTING_ARCHIVE, "utf-8");
    const git = vi.fn<GitRunner>(async (args) => (args[0] === "log" ? `${NEWER}\n${OLDER}\n` : DIFF));
    const provider = keywordProvider();

    const report = await run(config, {
      logger: silentLogger,
      git,
      provider,
      insertOptions: { pickMarker: () => "🧭" },
    });

    expect(report).toMatchObject({ total: 3, archived: 2, failed: 1 });
    expect(report?.outcomes.map((o) => o.status)).toEqual(["archived", "failed", "archived"]);

    expect(await readFile(join(dir, "category.md"), "utf-8")).toBe(
      "# Bookmark Archive\n\n## 🔧 Programming\n\n" +
        "**Title:** Rust Tips\n\n**Link:** https://rust.example/tips\n\n" +
        "**Summary:** Summary of body of https://rust.example/tips\n\n---\n\n" +
        "**Title:** Old\n\n**Link:** https://old.example\n\n**Summary:** Old summary\n\n" +
        "### 🧭 Travel\n\n" +
        "**Title:** Trip Notes\n\n**Link:** https://travel.example/notes\n\n" +
        "**Summary:** Summary of body of https://travel.example/notes\n"
    );
  });

  it("offers existing categories to the classifier", async () => {
    await writeFile(join(dir, "category.md"), EXISTING_ARCHIVE, "utf-8");
    const git = vi.fn<GitRunner>(async (args) => (args[0] === "log" ? `${NEWER}\n${OLDER}\n` : DIFF));
    const provider = keywordProvider();

    await run(config, { logger: silentLogger, git, provider, insertOptions: { pickMarker: () => "🧭" } });

    const classifyRequests = provider.requests.filter((r) => r.temperature === 0.1);
    expect(classifyRequests).toHaveLength(2);
    expect(classifyRequests[0].user).toContain("- Programming");
    expect(classifyRequests[0].user).not.toContain("- Travel");
  });

  it("returns null when there is no diff", async () => {
    const git = vi.fn<GitRunner>(async () => `${NEWER}\n`);

    expect(await run(config, { logger: silentLogger, git, provider: keywordProvider() })).toBeNull();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("reports an empty run when the change adds no links", async () => {
    const git = vi.fn<GitRunner>(async (args) =>
      args[0] === "log" ? `${NEWER}\n${OLDER}\n` : "-- [Removed](https://gone.example)\n+plain text\n"
    );

    expect(await run(config, { logger: silentLogger, git, provider: keywordProvider() })).toEqual({
      total: 0,
      archived: 0,
      failed: 0,
      outcomes: [],
    });
  });
});

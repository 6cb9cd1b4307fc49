import { mkdir, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { getLastChangeDiff, type GitRunner } from "../src/git.js";

const NEWER = "b".repeat(40);
const OLDER = "a".repeat(40);

describe("getLastChangeDiff", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "repo-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reports a directory without .git as not a repository", async () => {
    const git = vi.fn<GitRunner>();

    expect(await getLastChangeDiff("README.md", dir, { git })).toEqual({
      ok: false,
      reason: "not-a-repository",
    });
    expect(git).not.toHaveBeenCalled();
  });

  describe("in a repository", () => {
    beforeEach(async () => {
      await mkdir(join(dir, ".git"));
    });

    it("diffs the last two revisions of the file", async () => {
      const git = vi.fn<GitRunner>(async (args) => {
        if (args[0] === "log") return `${NEWER}\n${OLDER}\n`;
        return "+[Link](https://l.example)\n";
      });

      expect(await getLastChangeDiff("README.md", dir, { git })).toEqual({
        ok: true,
        diff: "+[Link](https://l.example)\n",
        newer: NEWER,
        older: OLDER,
      });
      expect(git).toHaveBeenNthCalledWith(1, ["log", "-n", "2", "--pretty=%H", "--", "README.md"], dir);
      expect(git).toHaveBeenNthCalledWith(2, ["diff", OLDER, NEWER, "--", "README.md"], dir);
    });

    it("reports a file with a single revision", async () => {
      const git = vi.fn<GitRunner>(async () => `${NEWER}\n`);

      expect(await getLastChangeDiff("README.md", dir, { git })).toEqual({
        ok: false,
        reason: "insufficient-history",
      });
      expect(git).toHaveBeenCalledTimes(1);
    });

    it("reports a file with no history", async () => {
      const git = vi.fn<GitRunner>(async () => "");

      expect(await getLastChangeDiff("README.md", dir, { git })).toMatchObject({
        ok: false,
        reason: "insufficient-history",
      });
    });

    it("reports a failing log command", async () => {
      const git = vi.fn<GitRunner>(async () => {
        throw new Error("fatal: bad revision");
      });

      expect(await getLastChangeDiff("README.md", dir, { git })).toEqual({
        ok: false,
        reason: "command-failed",
        detail: "fatal: bad revision",
      });
    });

    it("reports a failing diff command", async () => {
      const git = vi.fn<GitRunner>(async (args) => {
        if (args[0] === "log") return `${NEWER}\n${OLDER}\n`;
        throw new Error("diff failed");
      });

      expect(await getLastChangeDiff("README.md", dir, { git })).toEqual({
        ok: false,
        reason: "command-failed",
        detail: "diff failed",
      });
    });
  });
});

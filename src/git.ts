import { spawn } from "node:child_process";
import { stat } from "node:fs/promises";
import { join } from "node:path";

import { errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { DiffResult } from "./types.js";

/**
 * Runs `git` with the given arguments in `cwd` and resolves with stdout.
 * Rejects when git cannot be started or exits non-zero.
 */
export type GitRunner = (args: string[], cwd: string) => Promise<string>;

export const runGit: GitRunner = (args, cwd) =>
  new Promise((resolve, reject) => {
    const child = spawn("git", args, { cwd, stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";

    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("close", (code) => {
      if (code === 0) {
        resolve(stdout);
      } else {
        reject(new Error(`git ${args[0]} exited with code ${code}: ${stderr.trim()}`));
      }
    });

    child.on("error", (err) => {
      reject(err);
    });
  });

async function isRepository(repoPath: string): Promise<boolean> {
  try {
    return (await stat(join(repoPath, ".git"))).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Diff between the last two commits that touched `filePath`.
 * Never throws: a missing repository, a file with fewer than two
 * revisions, or a failing git command is reported in the result.
 */
export async function getLastChangeDiff(
  filePath: string,
  repoPath: string,
  options: { git?: GitRunner; logger?: Logger } = {}
): Promise<DiffResult> {
  const { git = runGit, logger = silentLogger } = options;

  if (!(await isRepository(repoPath))) {
    logger.error("Not a git repository", { repoPath });
    return { ok: false, reason: "not-a-repository" };
  }

  let hashes: string[];
  try {
    const log = await git(["log", "-n", "2", "--pretty=%H", "--", filePath], repoPath);
    hashes = log
      .trim()
      .split("\n")
      .map((h) => h.trim())
      .filter(Boolean);
  } catch (error) {
    logger.error("Failed to read commit history", { filePath, error: errorMessage(error) });
    return { ok: false, reason: "command-failed", detail: errorMessage(error) };
  }

  if (hashes.length < 2) {
    logger.info("File has fewer than two revisions, nothing to compare", { filePath });
    return { ok: false, reason: "insufficient-history" };
  }

  const [newer, older] = hashes;
  logger.info("Comparing last two revisions", {
    filePath,
    from: older.slice(0, 7),
    to: newer.slice(0, 7),
  });

  try {
    const diff = await git(["diff", older, newer, "--", filePath], repoPath);
    return { ok: true, diff, newer, older };
  } catch (error) {
    logger.error("git diff failed", { filePath, error: errorMessage(error) });
    return { ok: false, reason: "command-failed", detail: errorMessage(error) };
  }
}

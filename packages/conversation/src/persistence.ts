/**
 * Run artifacts: the raw run log and the aggregated result, written as one
 * directory per run.
 *
 *   <baseDir>/<runId>/events.jsonl
 *   <baseDir>/<runId>/result.json
 *
 * Both files are written into a hidden sibling directory first, then the
 * directory is published with a single rename. A published artifact is
 * never overwritten.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Logger } from "pino";
import { PersistenceError } from "@agent-ledger/stream-client";
import { replayRunLog } from "./aggregator.js";
import { silentLogger } from "./logger.js";
import { parseRunLog, parseRunResult, serializeRunLog } from "./run-log.js";
import type { RunLog, RunResult } from "./types.js";

export const EVENTS_FILE = "events.jsonl";
export const RESULT_FILE = "result.json";

/** Where a published artifact lives. */
export interface ArtifactLocation {
  dir: string;
  eventsPath: string;
  resultPath: string;
}

export interface RunArtifact {
  log: RunLog;
  result: RunResult;
}

/** Accepts a run log and its result; the seam tests substitute. */
export interface ArtifactWriter {
  /**
   * @throws {PersistenceError} When the artifact could not be published.
   */
  write(log: RunLog, result: RunResult): Promise<ArtifactLocation>;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

function isCollision(err: unknown): boolean {
  return (
    err instanceof Error && "code" in err && (err.code === "ENOTEMPTY" || err.code === "EEXIST")
  );
}

export class RunArtifactWriter implements ArtifactWriter {
  private readonly baseDir: string;
  private readonly logger: Logger;

  constructor(baseDir: string, options: { logger?: Logger } = {}) {
    this.baseDir = baseDir;
    this.logger = options.logger ?? silentLogger;
  }

  async write(log: RunLog, result: RunResult): Promise<ArtifactLocation> {
    const { runId } = log.header;
    if (runId === "" || runId !== path.basename(runId) || runId.startsWith(".")) {
      throw new PersistenceError(`Run id is not a valid directory name: "${runId}"`);
    }

    const dir = path.join(this.baseDir, runId);
    const location: ArtifactLocation = {
      dir,
      eventsPath: path.join(dir, EVENTS_FILE),
      resultPath: path.join(dir, RESULT_FILE),
    };

    let tmpDir: string;
    try {
      await fs.mkdir(this.baseDir, { recursive: true });
      if (await exists(dir)) {
        throw new PersistenceError(`Run artifact already exists: ${dir}`);
      }
      tmpDir = await fs.mkdtemp(path.join(this.baseDir, `.${runId}.`));
    } catch (err) {
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(`Cannot prepare artifact directory: ${describe(err)}`, {
        cause: err,
      });
    }

    let published = false;
    try {
      await fs.writeFile(path.join(tmpDir, EVENTS_FILE), serializeRunLog(log), "utf-8");
      await fs.writeFile(
        path.join(tmpDir, RESULT_FILE),
        JSON.stringify(result, null, 2) + "\n",
        "utf-8",
      );
      if (await exists(dir)) {
        throw new PersistenceError(`Run artifact already exists: ${dir}`);
      }
      try {
        await fs.rename(tmpDir, dir);
      } catch (err) {
        // An empty directory created since the check is replaced by rename;
        // a non-empty one makes it fail.
        if (isCollision(err)) {
          throw new PersistenceError(`Run artifact already exists: ${dir}`, { cause: err });
        }
        throw err;
      }
      published = true;
      return location;
    } catch (err) {
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(`Failed to write run artifact ${dir}: ${describe(err)}`, {
        cause: err,
      });
    } finally {
      if (!published) await this.discard(tmpDir);
    }
  }

  private async discard(tmpDir: string): Promise<void> {
    try {
      await fs.rm(tmpDir, { recursive: true, force: true });
    } catch (err) {
      this.logger.warn({ tmpDir, err }, "could not remove temporary artifact directory");
    }
  }
}

/**
 * Read both records of a published artifact.
 *
 * @throws {PersistenceError} When a file is missing or malformed.
 */
export async function readRunArtifact(dir: string): Promise<RunArtifact> {
  const eventsPath = path.join(dir, EVENTS_FILE);
  const resultPath = path.join(dir, RESULT_FILE);
  try {
    const [eventsText, resultText] = await Promise.all([
      fs.readFile(eventsPath, "utf-8"),
      fs.readFile(resultPath, "utf-8"),
    ]);
    return {
      log: parseRunLog(eventsText, eventsPath),
      result: parseRunResult(resultText, resultPath),
    };
  } catch (err) {
    throw new PersistenceError(`Cannot read run artifact ${dir}: ${describe(err)}`, {
      cause: err,
    });
  }
}

/** Rebuild a run's result from its `events.jsonl` alone. */
export async function reconstructRunResult(dir: string): Promise<RunResult> {
  const eventsPath = path.join(dir, EVENTS_FILE);
  let text: string;
  try {
    text = await fs.readFile(eventsPath, "utf-8");
  } catch (err) {
    throw new PersistenceError(`Cannot read run log ${eventsPath}: ${describe(err)}`, {
      cause: err,
    });
  }
  return replayRunLog(parseRunLog(text, eventsPath));
}

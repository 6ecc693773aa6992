// src/file-lock.ts — Serialized, atomic writes to one document
// In-process callers queue per path; other processes are kept out by an
// exclusive "<file>.lock" created with O_EXCL. The lock holds a token unique to
// its holder, and release only removes a lock whose token still matches.
// A lock older than staleMs is assumed to belong to a dead process: it is
// renamed aside under a unique name before removal, so two processes taking
// over the same stale lock cannot delete each other's fresh one.

import { randomUUID } from "node:crypto";
import { link, mkdir, open, readFile, rename, rm, stat, unlink, writeFile } from "node:fs/promises";
import { dirname, join, basename } from "node:path";
import { JournalWriteError } from "./types.js";

export interface LockOptions {
  timeoutMs?: number;
  staleMs?: number;
  retryMs?: number;
}

const DEFAULT_LOCK: Required<LockOptions> = {
  timeoutMs: 10_000,
  staleMs: 30_000,
  retryMs: 50,
};

const queues = new Map<string, Promise<void>>();

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const code = Reflect.get(err, "code");
  return typeof code === "string" ? code : undefined;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function wrap(target: string, message: string, err: unknown): JournalWriteError {
  return new JournalWriteError(target, message, err instanceof Error ? err : undefined);
}

async function release(lockPath: string, token: string, target: string): Promise<void> {
  try {
    const holder = await readFile(lockPath, "utf-8");
    if (holder === token) await unlink(lockPath);
  } catch (err: unknown) {
    // Already taken over and removed by another process
    if (errorCode(err) === "ENOENT") return;
    throw wrap(target, "cannot release lock file", err);
  }
}

export async function takeOverStale(lockPath: string, target: string, staleMs: number): Promise<void> {
  const aside = `${lockPath}.${randomUUID()}.stale`;
  try {
    await rename(lockPath, aside);
  } catch (err: unknown) {
    if (errorCode(err) === "ENOENT") return;
    throw wrap(target, "cannot take over stale lock file", err);
  }
  try {
    const moved = await stat(aside);
    if (Date.now() - moved.mtimeMs <= staleMs) {
      // A live lock replaced the stale one before our rename: put it back
      await link(aside, lockPath).catch((err: unknown) => {
        if (errorCode(err) !== "EEXIST") throw err;
      });
    }
  } catch (err: unknown) {
    throw wrap(target, "cannot take over stale lock file", err);
  } finally {
    await rm(aside, { force: true });
  }
}

async function acquire(lockPath: string, target: string, options: Required<LockOptions>): Promise<() => Promise<void>> {
  const deadline = Date.now() + options.timeoutMs;
  const token = `${process.pid}:${randomUUID()}`;
  await mkdir(dirname(lockPath), { recursive: true });

  for (;;) {
    try {
      const handle = await open(lockPath, "wx");
      try {
        await handle.writeFile(token);
      } finally {
        await handle.close();
      }
      return () => release(lockPath, token, target);
    } catch (err: unknown) {
      if (errorCode(err) !== "EEXIST") throw wrap(target, "cannot create lock file", err);
    }

    const age = await stat(lockPath).then(
      (s) => Date.now() - s.mtimeMs,
      (err: unknown) => {
        // Released between our open and stat
        if (errorCode(err) === "ENOENT") return 0;
        throw wrap(target, "cannot inspect lock file", err);
      },
    );
    if (age > options.staleMs) {
      await takeOverStale(lockPath, target, options.staleMs);
      continue;
    }
    if (Date.now() > deadline) {
      throw new JournalWriteError(target, `timed out waiting for ${basename(lockPath)}`);
    }
    await sleep(options.retryMs);
  }
}

/**
 * Run `fn` while holding the lock for `filePath`. Calls for the same path
 * run one at a time, in call order.
 */
export async function withFileLock<T>(
  filePath: string,
  fn: () => Promise<T>,
  options: LockOptions = {},
): Promise<T> {
  const opts = { ...DEFAULT_LOCK, ...options };
  const previous = queues.get(filePath) ?? Promise.resolve();

  const run = previous.then(async () => {
    const unlock = await acquire(`${filePath}.lock`, filePath, opts);
    try {
      return await fn();
    } finally {
      await unlock();
    }
  });

  // The queue only orders calls; each caller sees its own outcome through `run`
  const tail = run.then(
    () => undefined,
    () => undefined,
  );
  queues.set(filePath, tail);
  void tail.then(() => {
    if (queues.get(filePath) === tail) queues.delete(filePath);
  });

  return run;
}

/** Write to a temp file in the same directory, then rename over the target. */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(tmp, content, "utf-8");
    await rename(tmp, filePath);
  } catch (err: unknown) {
    await rm(tmp, { force: true });
    throw wrap(filePath, "atomic write failed", err);
  }
}

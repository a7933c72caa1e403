import { mkdir, rename, unlink, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { randomBytes } from "node:crypto";
import { setTimeout as sleep } from "node:timers/promises";

/**
 * Write content to a file atomically using temp+rename.
 * On Windows, rename can fail if another process has the file open --
 * retry with backoff (3 attempts: 50ms, 100ms, 200ms).
 */
export async function atomicWriteFile(filePath: string, content: string): Promise<void> {
  const resolved = resolve(filePath);
  await mkdir(dirname(resolved), { recursive: true });

  const tmpFile = resolved + ".tmp." + randomBytes(4).toString("hex");
  await writeFile(tmpFile, content, "utf-8");

  const delays = [50, 100, 200];

  for (let attempt = 0; attempt < delays.length; attempt++) {
    try {
      await rename(tmpFile, resolved);
      return;
    } catch (err: unknown) {
      if (attempt === delays.length - 1) {
        await unlink(tmpFile).catch(() => undefined);
        throw err;
      }
      await sleep(delays[attempt]);
    }
  }
}

/** True when the error is a filesystem "no such file" error. */
export function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}

/** True when the error is a filesystem "already exists" error. */
export function isAlreadyExists(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "EEXIST"
  );
}

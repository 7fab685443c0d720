import { randomBytes } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

function errorCode(err: unknown): unknown {
  return typeof err === "object" && err !== null && "code" in err ? err.code : "";
}

export function isMissingError(err: unknown): boolean {
  const code = errorCode(err);
  return code === "ENOENT" || code === "ENOTDIR";
}

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.stat(p);
    return true;
  } catch (err) {
    if (isMissingError(err)) return false;
    throw err;
  }
}

export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isMissingError(err)) return null;
    throw err;
  }
}

export async function removeIfExists(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (err) {
    if (isMissingError(err)) return false;
    throw err;
  }
}

async function fsyncDirectory(dir: string): Promise<void> {
  const handle = await fs.open(dir, "r");
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

async function readExistingMode(filePath: string): Promise<number | undefined> {
  try {
    const existing = await fs.stat(filePath);
    return existing.mode & 0o777;
  } catch (err) {
    if (isMissingError(err)) return undefined;
    throw err;
  }
}

export function tempPathFor(filePath: string): string {
  const dir = path.dirname(filePath);
  return path.join(dir, `.${path.basename(filePath)}.tmp.${process.pid}.${randomBytes(4).toString("hex")}`);
}

/**
 * Write-then-rename. Readers see either the previous file or the complete new
 * one; a failure before the rename leaves the previous file untouched and the
 * temp file removed.
 */
export async function writeFileAtomic(
  filePath: string,
  contents: string,
  opts: { mode?: number } = {},
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const mode = typeof opts.mode === "number" ? opts.mode : await readExistingMode(filePath);
  const tmp = tempPathFor(filePath);
  let tmpCreated = false;
  try {
    const handle = await fs.open(tmp, "w", mode);
    tmpCreated = true;
    try {
      await handle.writeFile(contents, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    if (typeof mode === "number" && process.platform !== "win32") {
      await fs.chmod(tmp, mode);
    }
    await fs.rename(tmp, filePath);
    tmpCreated = false;
    await fsyncDirectory(dir);
  } catch (err) {
    if (tmpCreated) {
      await removeIfExists(tmp);
    }
    throw err;
  }
}

export async function writeJsonFileAtomic(filePath: string, value: unknown, opts: { mode?: number } = {}): Promise<void> {
  await writeFileAtomic(filePath, `${JSON.stringify(value, null, 2)}\n`, opts);
}

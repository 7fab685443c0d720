import fs from "node:fs/promises";
import path from "node:path";
import process from "node:process";

export const PRIVATE_DIR_MODE = 0o700;
export const PRIVATE_FILE_MODE = 0o600;

export async function ensurePrivateDir(dirPath: string): Promise<void> {
  const dir = path.resolve(dirPath);
  await fs.mkdir(dir, { recursive: true, mode: PRIVATE_DIR_MODE });
  if (process.platform === "win32") return;
  const st = await fs.stat(dir);
  if (!st.isDirectory()) throw new Error(`not a directory: ${dir}`);
  if ((st.mode & 0o077) !== 0) await fs.chmod(dir, PRIVATE_DIR_MODE);
  const mode = (await fs.stat(dir)).mode & 0o777;
  if ((mode & 0o077) !== 0) throw new Error(`failed to secure directory permissions: ${dir} (mode 0${mode.toString(8)})`);
}

export async function describeLoosePermissions(filePath: string): Promise<string | null> {
  if (process.platform === "win32") return null;
  const st = await fs.stat(filePath);
  const mode = st.mode & 0o777;
  if ((mode & 0o077) === 0) return null;
  return `${filePath} is accessible by other users (mode 0${mode.toString(8)})`;
}

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const PackageInfoSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
});

export type PackageInfo = z.infer<typeof PackageInfoSchema>;

// Works from src/lib (tests) and from the bundled dist/main.js.
export function resolvePackageRoot(fromUrl: string = import.meta.url): string {
  let dir = path.dirname(fileURLToPath(fromUrl));
  for (let i = 0; i < 5; i += 1) {
    if (fs.existsSync(path.join(dir, "package.json"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.dirname(fileURLToPath(fromUrl));
}

export function readPackageInfo(rootDir: string = resolvePackageRoot()): PackageInfo {
  const pkgPath = path.join(rootDir, "package.json");
  const parsed = PackageInfoSchema.safeParse(JSON.parse(fs.readFileSync(pkgPath, "utf8")));
  if (!parsed.success) throw new Error(`missing name or version in ${pkgPath}`);
  return parsed.data;
}

export function readCliVersion(rootDir?: string): string {
  return readPackageInfo(rootDir).version;
}

export function userAgent(rootDir?: string): string {
  return `runnerctl/${readCliVersion(rootDir)}`;
}

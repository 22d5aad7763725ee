import { dirname, resolve } from "path";
import { fileURLToPath } from "url";

/** Repository root: two levels above this file (src/lib). */
export const REPO_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), "../..");

export const DEFAULT_CONTENT_DIR = resolve(REPO_ROOT, "content/posts");

/** Post sources live here; override with `CONTENT_DIR` (relative paths resolve from cwd). */
export function getContentDir(): string {
  const fromEnv = process.env.CONTENT_DIR?.trim();
  return fromEnv ? resolve(fromEnv) : DEFAULT_CONTENT_DIR;
}

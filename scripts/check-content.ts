/**
 * check-content: validate posts and the Tailwind content config.
 *
 * Usage:
 *   npm run check:content
 *   npm run check:content -- --content-dir ./drafts
 *
 * Exits 1 when any problem is found.
 */

import { runContentCheck } from "../src/lib/content-check";
import { getContentDir, REPO_ROOT } from "../src/lib/config";
import { UsageError } from "../src/lib/errors";
import { createCliLogger } from "../src/lib/logger";
import { resolve } from "path";
import tailwindConfig from "../tailwind.config";
import { readFlag } from "./lib/args";

const log = createCliLogger();

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  let contentDirFlag: string | undefined;
  try {
    contentDirFlag = readFlag(args, "content-dir");
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    log.error(`${error.message}. Usage: check-content [--content-dir <dir>]`);
    return 1;
  }
  const contentDir = contentDirFlag ? resolve(contentDirFlag) : getContentDir();

  const report = await runContentCheck({
    rootDir: REPO_ROOT,
    contentDir,
    tailwindConfig,
    logger: log,
  });

  return report.problems.length === 0 ? 0 : 1;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    log.error("check-content crashed", error instanceof Error ? error : new Error(String(error)));
    process.exitCode = 1;
  }
);

import { findMissingStaticEntries, parseContentConfig } from "./content-globs";
import { isContentError } from "./errors";
import { createLogger, type Logger } from "./logger";
import { listPostSlugs, loadPost } from "./posts";
import { renderPost } from "./render";

export interface ContentProblem {
  /** Post slug, or `tailwind.config` for configuration problems. */
  source: string;
  code: string;
  message: string;
}

export interface CheckedPost {
  slug: string;
  title: string;
  htmlLength: number;
}

export interface ContentCheckReport {
  posts: CheckedPost[];
  problems: ContentProblem[];
}

export interface ContentCheckOptions {
  /** Directory the Tailwind content globs are relative to. */
  rootDir: string;
  contentDir: string;
  /** The Tailwind config object, unvalidated. */
  tailwindConfig: unknown;
  logger?: Logger;
}

const CONFIG_SOURCE = "tailwind.config";

function toProblem(source: string, error: unknown): ContentProblem {
  if (isContentError(error)) {
    return { source, code: error.code, message: error.message };
  }
  // Anything that is not a ContentError is a bug, not a content problem
  throw error;
}

async function checkPost(slug: string, contentDir: string): Promise<CheckedPost> {
  const post = loadPost(slug, contentDir);
  const { html } = await renderPost(post.source);
  return { slug, title: post.frontmatter.title, htmlLength: html.length };
}

function checkConfig(tailwindConfig: unknown, rootDir: string): ContentProblem[] {
  try {
    const config = parseContentConfig(tailwindConfig);
    return findMissingStaticEntries(config, rootDir).map((pattern) => ({
      source: CONFIG_SOURCE,
      code: "MISSING_CONTENT_FILE",
      message: `Content entry ${pattern} does not exist`,
    }));
  } catch (error) {
    return [toProblem(CONFIG_SOURCE, error)];
  }
}

/**
 * Validate every post under `contentDir` and the Tailwind content config.
 * Content problems are collected; unexpected errors propagate.
 */
export async function runContentCheck(options: ContentCheckOptions): Promise<ContentCheckReport> {
  const log = options.logger ?? createLogger("content-check");
  const posts: CheckedPost[] = [];
  const problems: ContentProblem[] = [];

  const slugs = listPostSlugs(options.contentDir);
  if (slugs.length === 0) {
    problems.push({
      source: options.contentDir,
      code: "NO_POSTS",
      message: `No .md or .mdx posts found in ${options.contentDir}`,
    });
  }

  for (const slug of slugs) {
    try {
      const checked = await checkPost(slug, options.contentDir);
      log.debug(`${slug}: ok (${checked.htmlLength} chars of HTML)`);
      posts.push(checked);
    } catch (error) {
      problems.push(toProblem(slug, error));
    }
  }

  problems.push(...checkConfig(options.tailwindConfig, options.rootDir));

  for (const problem of problems) {
    log.error(`[${problem.source}] ${problem.code}: ${problem.message}`);
  }
  log.info(`Checked ${slugs.length} post(s): ${problems.length} problem(s)`);

  return { posts, problems };
}

import { existsSync, readdirSync, readFileSync, statSync } from "fs";
import { extname, join } from "path";
import { getContentDir } from "./config";
import { PostNotFoundError } from "./errors";
import { parsePost, type PostFrontmatter } from "./frontmatter";

export const POST_EXTENSIONS = [".mdx", ".md"] as const;

export interface Post {
  slug: string;
  /** Absolute path of the source file. */
  path: string;
  frontmatter: PostFrontmatter;
  body: string;
  source: string;
}

function isPostFile(filename: string): boolean {
  return POST_EXTENSIONS.some((ext) => ext === extname(filename));
}

/**
 * Slugs (file names without extension) of every post in `dir`, sorted.
 * A slug with both a `.md` and an `.mdx` file is listed once.
 */
export function listPostSlugs(dir: string = getContentDir()): string[] {
  if (!existsSync(dir)) return [];
  const slugs = readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && isPostFile(entry.name))
    .map((entry) => entry.name.slice(0, -extname(entry.name).length));
  return [...new Set(slugs)].sort();
}

function isFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

function findPostPath(slug: string, dir: string): string | null {
  for (const ext of POST_EXTENSIONS) {
    const candidate = join(dir, `${slug}${ext}`);
    if (isFile(candidate)) return candidate;
  }
  return null;
}

/**
 * Read and parse one post. `.mdx` wins over `.md` when both exist.
 *
 * @throws PostNotFoundError, or FrontmatterError from `parsePost`
 */
export function loadPost(slug: string, dir: string = getContentDir()): Post {
  const path = findPostPath(slug, dir);
  if (!path) {
    throw new PostNotFoundError(slug, dir);
  }

  const source = readFileSync(path, "utf-8");
  const { frontmatter, body } = parsePost(source);
  return { slug, path, frontmatter, body, source };
}

import { remark } from "remark";
import remarkGfm from "remark-gfm";
import remarkHtml from "remark-html";
import { rehype } from "rehype";
import rehypeSanitize from "rehype-sanitize";
import rehypeStringify from "rehype-stringify";
import { assertFencesBalanced } from "./code-fences";
import { ContentError } from "./errors";
import { parsePost, type PostFrontmatter } from "./frontmatter";
import { createLogger } from "./logger";

const log = createLogger("render");

/**
 * Render a Markdown body to sanitized HTML.
 *
 * 1. Parse with GitHub Flavored Markdown (tables, strikethrough, task lists)
 * 2. Convert to HTML without sanitizing
 * 3. Re-parse the HTML and sanitize it with the default GitHub schema
 * 4. Stringify
 *
 * Code blocks keep their `language-*` class, which the default schema allows.
 *
 * @throws ContentError with code `RENDER_FAILED`
 */
export async function renderMarkdown(markdown: string): Promise<string> {
  try {
    const htmlResult = await remark()
      .use(remarkGfm)
      .use(remarkHtml, { sanitize: false })
      .process(markdown);

    const sanitizedResult = await rehype()
      .data("settings", { fragment: true })
      .use(rehypeSanitize)
      .use(rehypeStringify)
      .process(String(htmlResult));

    return String(sanitizedResult);
  } catch (error) {
    throw new ContentError(
      `Failed to render markdown: ${error instanceof Error ? error.message : "Unknown error"}`,
      "RENDER_FAILED"
    );
  }
}

export interface RenderedPost {
  frontmatter: PostFrontmatter;
  html: string;
}

/**
 * Parse, check and render a complete post source (front-matter + body).
 * Fence errors name the line in the whole source.
 *
 * @throws FrontmatterError, UnclosedFenceError, or ContentError (`RENDER_FAILED`)
 */
export async function renderPost(source: string): Promise<RenderedPost> {
  const { frontmatter, body, bodyLineOffset } = parsePost(source);
  const fences = assertFencesBalanced(body, { lineOffset: bodyLineOffset });
  const html = await renderMarkdown(body);

  log.debug(`Rendered "${frontmatter.title}" (${fences.length} code blocks, ${html.length} chars)`);
  return { frontmatter, html };
}

// @vitest-environment node
import { describe, it, expect } from "vitest";
import { loadPost } from "./posts";
import { UnclosedFenceError } from "./errors";
import { renderMarkdown, renderPost } from "./render";

const FRONTMATTER = '---\ntitle: "T"\ndesc: "D"\ndate: "2024-03-12"\ntags: ["x"]\n---\n';

describe("renderMarkdown", () => {
  it("renders headings and inline formatting", async () => {
    const html = await renderMarkdown("# Hello\n\nThis is **bold** text.");
    expect(html.trim()).toBe("<h1>Hello</h1>\n<p>This is <strong>bold</strong> text.</p>");
  });

  it("keeps the language class on fenced code", async () => {
    const html = await renderMarkdown("```ts\nconst a = 1;\n```");
    expect(html.trim()).toBe('<pre><code class="language-ts">const a = 1;\n</code></pre>');
  });

  it("escapes markup inside code blocks", async () => {
    const html = await renderMarkdown("```tsx\n<Form />\n```");
    expect(html.trim()).toBe('<pre><code class="language-tsx">&#x3C;Form />\n</code></pre>');
  });

  it("supports GFM tables", async () => {
    const html = await renderMarkdown("| a | b |\n| - | - |\n| 1 | 2 |");
    expect(html).toContain("<table>");
    expect(html).toContain("<td>1</td>");
  });

  it("strips script tags", async () => {
    const html = await renderMarkdown("<script>alert(1)</script>\n\nSafe");
    expect(html).not.toContain("<script");
    expect(html).toContain("<p>Safe</p>");
  });
});

describe("renderPost", () => {
  it("returns front-matter and HTML", async () => {
    const rendered = await renderPost(`${FRONTMATTER}Hello *world*\n`);

    expect(rendered.frontmatter.title).toBe("T");
    expect(rendered.html.trim()).toBe("<p>Hello <em>world</em></p>");
  });

  it("refuses a body with an unclosed fence", async () => {
    await expect(renderPost(`${FRONTMATTER}\n\`\`\`ts\nconst a = 1;\n`)).rejects.toBeInstanceOf(
      UnclosedFenceError
    );
  });

  it("reports the unclosed fence by its line in the whole file", async () => {
    await expect(renderPost(`${FRONTMATTER}\n\`\`\`ts\nconst a = 1;\n`)).rejects.toThrow(
      "Code fence opened with ``` on line 8 is never closed."
    );
  });

  it("renders the published post with every code block closed", async () => {
    const post = loadPost("react-hook-form");
    const { frontmatter, html } = await renderPost(post.source);

    expect(frontmatter.title).toBe("Validating React forms with React Hook Form and Zod");
    expect(html.match(/<pre>/g)).toHaveLength(10);
    expect(html.match(/<\/pre>/g)).toHaveLength(10);
    expect(html).toContain('<h2>Tailwind configuration</h2>');
  });
});

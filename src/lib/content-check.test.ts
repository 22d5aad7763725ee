// @vitest-environment node
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import tailwindConfig from "../../tailwind.config";
import { DEFAULT_CONTENT_DIR, REPO_ROOT } from "./config";
import { runContentCheck } from "./content-check";
import { createLogger, type LogLevel } from "./logger";

const GOOD = '---\ntitle: "Good"\ndesc: "Fine"\ndate: "2024-01-01"\ntags: ["a"]\n---\n```ts\nok\n```\n';
const UNCLOSED = '---\ntitle: "Open"\ndesc: "Oops"\ndate: "2024-01-02"\ntags: ["a"]\n---\n\n```ts\nnever closed\n';
const NO_TITLE = '---\ndesc: "Untitled"\ndate: "2024-01-03"\ntags: ["a"]\n---\nBody\n';

describe("runContentCheck", () => {
  let dir: string;
  let lines: Array<{ level: LogLevel; line: string }>;
  const logger = () =>
    createLogger("content-check", {
      level: "DEBUG",
      sink: (level, line) => lines.push({ level, line }),
    });

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "content-check-"));
    lines = [];
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("passes the repository's own post and Tailwind config", async () => {
    const report = await runContentCheck({
      rootDir: REPO_ROOT,
      contentDir: DEFAULT_CONTENT_DIR,
      tailwindConfig,
      logger: logger(),
    });

    expect(report.problems).toEqual([]);
    expect(report.posts.map((post) => post.slug)).toEqual(["react-hook-form"]);
  });

  it("collects a problem per broken post and keeps checking the rest", async () => {
    writeFileSync(join(dir, "good.md"), GOOD);
    writeFileSync(join(dir, "open.md"), UNCLOSED);
    writeFileSync(join(dir, "untitled.mdx"), NO_TITLE);

    const report = await runContentCheck({
      rootDir: REPO_ROOT,
      contentDir: dir,
      tailwindConfig,
      logger: logger(),
    });

    expect(report.posts.map((post) => post.title)).toEqual(["Good"]);
    expect(report.problems).toEqual([
      {
        source: "open",
        code: "UNCLOSED_CODE_FENCE",
        message: "Code fence opened with ``` on line 8 is never closed.",
      },
      {
        source: "untitled",
        code: "INVALID_FRONTMATTER",
        message: "Invalid front-matter: title: Title is required",
      },
    ]);
  });

  it("checks a slug with both extensions once, using the .mdx file", async () => {
    writeFileSync(join(dir, "both.md"), NO_TITLE);
    writeFileSync(join(dir, "both.mdx"), GOOD);
    mkdirSync(join(dir, "dir.mdx"));
    writeFileSync(join(dir, "dir.md"), GOOD.replace('"Good"', '"Beside a folder"'));

    const report = await runContentCheck({
      rootDir: REPO_ROOT,
      contentDir: dir,
      tailwindConfig,
      logger: logger(),
    });

    expect(report.problems).toEqual([]);
    expect(report.posts.map((post) => [post.slug, post.title])).toEqual([
      ["both", "Good"],
      ["dir", "Beside a folder"],
    ]);
    expect(lines.at(-1)?.line).toMatch(/Checked 2 post\(s\): 0 problem\(s\)$/);
  });

  it("reports an empty content directory", async () => {
    const report = await runContentCheck({
      rootDir: REPO_ROOT,
      contentDir: dir,
      tailwindConfig,
      logger: logger(),
    });

    expect(report.problems).toEqual([
      { source: dir, code: "NO_POSTS", message: `No .md or .mdx posts found in ${dir}` },
    ]);
  });

  it("reports invalid config and missing literal entries", async () => {
    writeFileSync(join(dir, "good.md"), GOOD);

    const invalid = await runContentCheck({
      rootDir: REPO_ROOT,
      contentDir: dir,
      tailwindConfig: { content: ["src/a.ts"], theme: { extend: {} }, plugins: [] },
      logger: logger(),
    });
    expect(invalid.problems).toEqual([
      {
        source: "tailwind.config",
        code: "INVALID_CONTENT_CONFIG",
        message:
          'Invalid content configuration: content.0: "src/a.ts": Pattern must be relative and start with ./ or ../',
      },
    ]);

    const missing = await runContentCheck({
      rootDir: dir,
      contentDir: dir,
      tailwindConfig: { content: ["./good.md", "./gone.mdx"], theme: { extend: {} }, plugins: [] },
      logger: logger(),
    });
    expect(missing.problems).toEqual([
      {
        source: "tailwind.config",
        code: "MISSING_CONTENT_FILE",
        message: "Content entry ./gone.mdx does not exist",
      },
    ]);
  });

  it("logs each problem at ERROR and a summary at INFO", async () => {
    writeFileSync(join(dir, "open.md"), UNCLOSED);

    await runContentCheck({ rootDir: REPO_ROOT, contentDir: dir, tailwindConfig, logger: logger() });

    const errors = lines.filter((entry) => entry.level === "ERROR").map((entry) => entry.line);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatch(
      /\[ERROR\] \[content-check\] \[open\] UNCLOSED_CODE_FENCE: Code fence opened with ``` on line 8 is never closed\.$/
    );
    expect(lines.at(-1)?.line).toMatch(/\[INFO\] \[content-check\] Checked 1 post\(s\): 1 problem\(s\)$/);
  });
});

import { existsSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import { ContentConfigError } from "./errors";

const GLOB_MAGIC = /[*?[\]{}]/;

/** True when the pattern matches exactly one path (no wildcards, classes or braces). */
export function isStaticPattern(pattern: string): boolean {
  return !GLOB_MAGIC.test(pattern);
}

function checkBraces(pattern: string): string[] {
  const problems: string[] = [];
  // Start index of the current alternative, one per open brace
  const alternativeStarts: number[] = [];
  let inClass = false;

  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];

    if (inClass) {
      if (char === "]") inClass = false;
      continue;
    }

    if (char === "[") {
      if (pattern[i + 1] === "]") {
        problems.push("Empty character class `[]`");
        i++;
        continue;
      }
      inClass = true;
    } else if (char === "{") {
      alternativeStarts.push(i + 1);
    } else if (char === "," || char === "}") {
      const start = alternativeStarts.pop();
      if (start === undefined) {
        if (char === "}") problems.push("Closing `}` without an opening `{`");
        continue;
      }
      if (start === i) problems.push("Empty alternative inside `{}`");
      if (char === ",") alternativeStarts.push(i + 1);
    }
  }

  if (inClass) problems.push("Unclosed character class `[`");
  if (alternativeStarts.length > 0) problems.push("Unclosed `{`");
  return problems;
}

/**
 * Syntax problems in a content glob, empty when the pattern is usable.
 * Patterns are resolved against the config file, so they must be relative.
 */
export function validateGlob(pattern: string): string[] {
  if (pattern.length === 0) return ["Pattern is empty"];

  const problems: string[] = [];
  if (pattern.trim() !== pattern) problems.push("Pattern has leading or trailing whitespace");
  if (!pattern.startsWith("./") && !pattern.startsWith("../")) {
    problems.push("Pattern must be relative and start with ./ or ../");
  }
  if (pattern.includes("\\")) problems.push("Use forward slashes, not backslashes");
  if (pattern.split("/").some((segment) => segment.includes("**") && segment !== "**")) {
    problems.push("`**` must be a whole path segment");
  }
  return [...problems, ...checkBraces(pattern)];
}

const globSchema = z.string().superRefine((pattern, ctx) => {
  for (const problem of validateGlob(pattern)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${pattern}": ${problem}` });
  }
});

/**
 * The subset of a Tailwind config this repo declares: a content glob list
 * and two extension points. Unknown keys are rejected.
 */
export const contentConfigSchema = z
  .object({
    content: z
      .array(globSchema)
      .min(1, "At least one content glob is required")
      .refine(
        (patterns) => new Set(patterns).size === patterns.length,
        "Content globs must not repeat"
      ),
    theme: z
      .object({
        extend: z.record(z.unknown()),
      })
      .strict(),
    plugins: z.array(z.unknown()),
  })
  .strict();

export type ContentConfig = z.infer<typeof contentConfigSchema>;

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

/** @throws ContentConfigError listing every issue, not only the first. */
export function parseContentConfig(value: unknown): ContentConfig {
  const result = contentConfigSchema.safeParse(value);
  if (!result.success) {
    throw new ContentConfigError(result.error.issues.map(formatIssue));
  }
  return result.data;
}

/** Literal entries of `config.content` that do not exist under `rootDir`. */
export function findMissingStaticEntries(config: ContentConfig, rootDir: string): string[] {
  return config.content
    .filter(isStaticPattern)
    .filter((pattern) => !existsSync(resolve(rootDir, pattern)));
}

import matter from "gray-matter";
import { z } from "zod";
import { FrontmatterError } from "./errors";
import { describeFieldErrors, validateWithSchema } from "./validation";

const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

/** True when `value` is `YYYY-MM-DD` and names a day that exists. */
export function isCalendarDay(value: string): boolean {
  const match = ISO_DAY.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    date.getUTCFullYear() === Number(y) &&
    date.getUTCMonth() === Number(m) - 1 &&
    date.getUTCDate() === Number(d)
  );
}

/**
 * YAML turns an unquoted `2024-03-12` into a Date at UTC midnight; fold it
 * back to the string form so both spellings validate the same way.
 */
const publicationDateSchema = z.preprocess(
  (value) => (value instanceof Date ? value.toISOString().slice(0, 10) : value),
  z
    .string({ required_error: "Date is required" })
    .regex(ISO_DAY, "Date must be written as YYYY-MM-DD")
    .refine(isCalendarDay, "Date must be a real calendar day")
);

/**
 * Front-matter of a post. Exactly these four keys; anything else is rejected
 * so a typo such as `description:` surfaces instead of silently vanishing.
 */
export const postFrontmatterSchema = z
  .object({
    title: z.string({ required_error: "Title is required" }).trim().min(1, "Title is required"),
    desc: z
      .string({ required_error: "Description is required" })
      .trim()
      .min(1, "Description is required"),
    date: publicationDateSchema,
    tags: z
      .array(z.string().trim().min(1, "Tags cannot be empty"), {
        required_error: "At least one tag is required",
      })
      .min(1, "At least one tag is required")
      .refine((tags) => new Set(tags).size === tags.length, "Tags must be unique"),
  })
  .strict();

export type PostFrontmatter = z.infer<typeof postFrontmatterSchema>;

export interface ParsedPost {
  frontmatter: PostFrontmatter;
  /** Document body with the front-matter block removed. */
  body: string;
  /** Number of source lines before the body, i.e. the front-matter block. */
  bodyLineOffset: number;
}

function countLines(text: string): number {
  return text.split(/\r?\n/).length;
}

/**
 * Split a post into validated front-matter and body.
 *
 * @throws FrontmatterError when the block is missing, is not valid YAML, or
 *   fails `postFrontmatterSchema`. `details.fields` maps each failing key to
 *   its first message.
 */
export function parsePost(source: string): ParsedPost {
  if (!matter.test(source)) {
    throw new FrontmatterError("Post has no front-matter block");
  }

  let parsed: matter.GrayMatterFile<string>;
  try {
    parsed = matter(source);
  } catch (error) {
    throw new FrontmatterError(
      `Failed to parse front-matter: ${error instanceof Error ? error.message : "Unknown error"}`
    );
  }

  const result = validateWithSchema(postFrontmatterSchema, parsed.data, "front-matter");
  if (!result.success) {
    throw new FrontmatterError(
      `Invalid front-matter: ${describeFieldErrors(result.fieldErrors).join("; ")}`,
      result.fieldErrors
    );
  }

  // gray-matter's content is a suffix of the source
  const bodyLineOffset = countLines(source) - countLines(parsed.content);
  return { frontmatter: result.data, body: parsed.content, bodyLineOffset };
}

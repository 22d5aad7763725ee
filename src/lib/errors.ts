/**
 * Typed errors for the content tooling.
 *
 * Library functions throw these; `scripts/check-content.ts` catches them and
 * reports `code` plus `message`.
 */

// ============================================
// Base Error
// ============================================

export class ContentError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ContentError";
  }
}

// ============================================
// Document Errors
// ============================================

export class PostNotFoundError extends ContentError {
  constructor(slug: string, dir: string) {
    super(`Post not found: ${slug} (looked in ${dir}).`, "POST_NOT_FOUND", { slug, dir });
    this.name = "PostNotFoundError";
  }
}

export class FrontmatterError extends ContentError {
  constructor(message: string, fields?: Record<string, string>) {
    super(message, "INVALID_FRONTMATTER", fields ? { fields } : undefined);
    this.name = "FrontmatterError";
  }
}

export class UnclosedFenceError extends ContentError {
  constructor(openLine: number, marker: string) {
    super(
      `Code fence opened with ${marker} on line ${openLine} is never closed.`,
      "UNCLOSED_CODE_FENCE",
      { openLine, marker }
    );
    this.name = "UnclosedFenceError";
  }
}

// ============================================
// Configuration Errors
// ============================================

export class ContentConfigError extends ContentError {
  constructor(issues: string[]) {
    super(`Invalid content configuration: ${issues.join("; ")}`, "INVALID_CONTENT_CONFIG", {
      issues,
    });
    this.name = "ContentConfigError";
  }
}

// ============================================
// CLI Errors
// ============================================

export class UsageError extends ContentError {
  constructor(message: string) {
    super(message, "INVALID_USAGE");
    this.name = "UsageError";
  }
}

export function isContentError(error: unknown): error is ContentError {
  return error instanceof ContentError;
}

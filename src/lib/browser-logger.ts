/**
 * Console logger for code that runs in the browser (the example form).
 *
 * `logger.ts` is the one for scripts and content tooling; this one never
 * touches Node APIs beyond reading `NODE_ENV`, which bundlers inline.
 */

export interface BrowserLogger {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, error?: Error) => void;
  error: (message: string, error?: Error) => void;
}

/**
 * @example
 * ```typescript
 * const logger = createBrowserLogger("sign-up-form");
 * logger.info("Submitted", { email: "ada@example.com" });
 * // Output: [sign-up-form] INFO: Submitted { email: "ada@example.com" }
 * ```
 */
export function createBrowserLogger(source: string): BrowserLogger {
  const prefix = `[${source}]`;

  const withOptional = (level: string, message: string, extra: unknown): unknown[] =>
    extra === undefined ? [`${prefix} ${level}:`, message] : [`${prefix} ${level}:`, message, extra];

  return {
    debug: (message, data) => {
      if (process.env.NODE_ENV === "development") {
        console.debug(...withOptional("DEBUG", message, data));
      }
    },

    info: (message, data) => {
      console.info(...withOptional("INFO", message, data));
    },

    warn: (message, error) => {
      console.warn(...withOptional("WARN", message, error));
    },

    error: (message, error) => {
      console.error(...withOptional("ERROR", message, error));
    },
  };
}

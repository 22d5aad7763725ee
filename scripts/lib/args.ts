/**
 * Flag parsing for the content scripts.
 *
 * Only `--name value` and `--name=value` are understood; positional
 * arguments are ignored.
 */

import { UsageError } from "../../src/lib/errors";

/**
 * Value of an optional string flag, `undefined` when the flag is absent.
 *
 * @throws UsageError when the flag is given without a value
 */
export function readFlag(args: readonly string[], name: string): string | undefined {
  const flag = `--${name}`;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (arg.startsWith(`${flag}=`)) {
      const value = arg.slice(flag.length + 1);
      if (!value) throw new UsageError(`Missing value for ${flag}`);
      return value;
    }

    if (arg === flag) {
      const next = args[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new UsageError(`Missing value for ${flag}`);
      }
      return next;
    }
  }
  return undefined;
}

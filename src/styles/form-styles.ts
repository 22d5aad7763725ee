/**
 * Tailwind class names for the example form and the post page.
 *
 * Kept under src/styles so the Tailwind content globs pick them up,
 * and the stock Tailwind palette is the only theme dependency.
 */

// =============================================================================
// FORM FIELD STYLES
// =============================================================================

export const fieldStyles = {
  group: "flex flex-col gap-1.5",
  label: "text-sm font-semibold text-slate-700",
  hint: "text-xs text-slate-500",
  error: "text-xs font-medium text-red-600",
};

export const inputStyles = {
  base: "w-full rounded-lg border border-slate-300 bg-white px-3 py-2 text-slate-900 transition-colors focus:border-indigo-500 focus:outline-none focus:ring-2 focus:ring-indigo-500/20",
  invalid: "border-red-500 focus:border-red-500 focus:ring-red-500/20",
  checkbox: "h-4 w-4 rounded border-slate-300 text-indigo-600 focus:ring-indigo-500",
};

/** Join the base input class with the invalid modifier when needed. */
export function inputClassName(isInvalid: boolean): string {
  return isInvalid ? `${inputStyles.base} ${inputStyles.invalid}` : inputStyles.base;
}

// =============================================================================
// FORM LAYOUT STYLES
// =============================================================================

export const formStyles = {
  container: "mx-auto flex w-full max-w-md flex-col gap-5 rounded-xl border border-slate-200 bg-white p-6 shadow-sm",
  title: "text-lg font-semibold text-slate-900",
  checkboxRow: "flex items-center gap-2 text-sm text-slate-700",
  submit:
    "inline-flex items-center justify-center gap-2 rounded-lg bg-indigo-600 px-4 py-2 text-sm font-medium text-white transition hover:bg-indigo-500 focus:outline-none focus-visible:ring-2 focus-visible:ring-indigo-500 focus-visible:ring-offset-2 disabled:cursor-not-allowed disabled:opacity-60",
  alert: "rounded-lg border border-red-200 bg-red-50 p-3 text-sm text-red-700",
  success: "rounded-lg border border-emerald-200 bg-emerald-50 p-3 text-sm text-emerald-700",
};

// =============================================================================
// POST STYLES
// =============================================================================

export const postStyles = {
  article: "mx-auto max-w-3xl px-4 py-10",
  header: "mb-8 border-b border-slate-200 pb-6",
  title: "text-3xl font-bold tracking-tight text-slate-900",
  desc: "mt-2 text-lg text-slate-600",
  meta: "mt-4 flex flex-wrap items-center gap-3 text-sm text-slate-500",
  tag: "inline-flex items-center gap-1 rounded-full bg-slate-100 px-2.5 py-0.5 text-xs font-medium text-slate-700",
  body: "space-y-4 leading-7 text-slate-800",
};

/**
 * Markup that has already been escaped or is trusted as-is.
 * Interpolating a SafeHtml into `html` inserts it verbatim.
 */
export class SafeHtml {
  constructor(readonly value: string) {}

  toString(): string {
    return this.value;
  }
}

export type Interpolation =
  | SafeHtml
  | string
  | number
  | boolean
  | null
  | undefined
  | readonly Interpolation[];

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export const escapeHtml = (text: string): string =>
  text.replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch);

/** Mark trusted markup so `html` does not escape it */
export const raw = (markup: string): SafeHtml => new SafeHtml(markup);

const interpolate = (value: Interpolation): string => {
  if (value instanceof SafeHtml) return value.value;
  if (Array.isArray(value)) return value.map(interpolate).join("");
  if (value === null || value === undefined || value === false) return "";
  return escapeHtml(String(value));
};

/**
 * Tagged template producing escaped markup.
 *
 *   html`<p>${user.name}</p>`          → name is escaped
 *   html`<ul>${items.map(li)}</ul>`    → arrays are concatenated
 *   html`${cond && html`<b>x</b>`}`    → false renders nothing
 */
export const html = (strings: TemplateStringsArray, ...values: Interpolation[]): SafeHtml => {
  let out = strings[0] ?? "";
  for (let i = 0; i < values.length; i++) {
    out += interpolate(values[i]) + (strings[i + 1] ?? "");
  }
  return new SafeHtml(out);
};

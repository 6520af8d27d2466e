import slugifyModule from "slugify";

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function titleCase(text: string): string {
  return text
    .split(" ")
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

/** Upper-case database codes ("CUSHION", "halo_setting") rendered as display words. */
export function displayCase(raw: string): string {
  return titleCase(normalizeWhitespace(raw.toLowerCase().replace(/_+/g, " ")));
}

export function trimToNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Periods are dropped so "2.80" becomes "280"; any other run of non-alphanumerics becomes one hyphen.
 */
export function makeSlug(input: string): string {
  const slugify = slugifyModule as unknown as (
    value: string,
    options?: {
      lower?: boolean;
      strict?: boolean;
      trim?: boolean;
    },
  ) => string;

  const spaced = input.replace(/\./g, "").replace(/[^\p{L}\p{N}]+/gu, " ");
  return slugify(spaced, {
    lower: true,
    strict: true,
    trim: true,
  }).replace(/^-+|-+$/g, "");
}

export const isArray: typeof Array.isArray = Array.isArray;

export const isString = (val: unknown): val is string => typeof val === "string";

export const isNumber = (val: unknown): val is number =>
  typeof val === "number" && !Number.isNaN(val);

export const isObject = (val: unknown): val is Record<string, unknown> =>
  val !== null && typeof val === "object" && !isArray(val);

export const isStringArray = (val: unknown): val is string[] =>
  isArray(val) && val.every(isString);

/**
 * "03-sharded_matrices" -> "Sharded Matrices"
 */
export function titleFromFileName(name: string): string {
  return name
    .replace(/^\d+[-_]/, "")
    .split(/[-_]/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

/**
 * Heading text -> fragment id. Keeps letters and digits of any script,
 * collapses whitespace and hyphens into a single `-`.
 */
export function slugify(text: string): string {
  return text
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s_-]/gu, "")
    .trim()
    .replace(/[\s_-]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

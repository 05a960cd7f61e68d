import type { NormalizationForm } from "../editor";

export type Comparator = (a: string, b: string) => number;

export function normalizeElement(
  text: string,
  form: NormalizationForm,
): string {
  return text.normalize(form).trim();
}

/**
 * Case- and accent-insensitive ordering for `locale`. Elements that only
 * differ in accents or case fall back to full collation so the result does
 * not depend on input order.
 */
export function createComparator(locale: string): Comparator {
  const base = new Intl.Collator(locale, { sensitivity: "base" });
  const variant = new Intl.Collator(locale, { sensitivity: "variant" });
  return (a, b) => base.compare(a, b) || variant.compare(a, b);
}

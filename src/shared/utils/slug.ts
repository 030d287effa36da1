import type { HasSlugSource } from "../../core/entities/tenant.entity.js";

/**
 * URL slug from an entity's slug source: lowercase ASCII words joined by "-".
 * Falls back to "item" when nothing sluggable remains.
 */
export const slugify = (source: HasSlugSource): string => {
  const slug = source
    .slugSource()
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 50)
    .replace(/-+$/, "");
  return slug === "" ? "item" : slug;
};

/**
 * First of `base`, `base-2`, `base-3`, … that `isTaken` rejects.
 */
export const uniqueSlug = (base: string, isTaken: (slug: string) => boolean): string => {
  if (!isTaken(base)) return base;
  let n = 2;
  while (isTaken(`${base}-${n}`)) n++;
  return `${base}-${n}`;
};

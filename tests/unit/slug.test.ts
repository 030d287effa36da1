import { describe, expect, it } from "vitest";
import { tenantDraft } from "../../src/core/entities/tenant.entity.js";
import { slugify, uniqueSlug } from "../../src/shared/utils/slug.js";

describe("slugify", () => {
  it("lowercases and joins words with dashes", () => {
    expect(slugify(tenantDraft("  Acme  Widgets, Inc. "))).toBe("acme-widgets-inc");
  });

  it("strips accents", () => {
    expect(slugify(tenantDraft("Café Crème"))).toBe("cafe-creme");
  });

  it("falls back when nothing sluggable remains", () => {
    expect(slugify(tenantDraft("!!!"))).toBe("item");
  });

  it("caps the length without a trailing dash", () => {
    const slug = slugify(tenantDraft(`${"a".repeat(49)} b`));
    expect(slug).toBe("a".repeat(49));
  });
});

describe("uniqueSlug", () => {
  it("returns the base when free", () => {
    expect(uniqueSlug("acme", () => false)).toBe("acme");
  });

  it("appends the first free counter", () => {
    const taken = new Set(["acme", "acme-2", "acme-3"]);
    expect(uniqueSlug("acme", (s) => taken.has(s))).toBe("acme-4");
  });
});

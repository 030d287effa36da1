import { describe, expect, it } from "vitest";
import { SafeHtml, escapeHtml, html, raw } from "../../src/infrastructure/templates/html.js";

describe("html", () => {
  it("escapes interpolated text", () => {
    const name = `<script>alert("x")</script>`;
    expect(html`<p>${name}</p>`.value).toBe(
      "<p>&lt;script&gt;alert(&quot;x&quot;)&lt;/script&gt;</p>",
    );
  });

  it("escapes ampersands and single quotes", () => {
    expect(escapeHtml("Tom & Jerry's")).toBe("Tom &amp; Jerry&#39;s");
  });

  it("inserts SafeHtml verbatim", () => {
    const inner = html`<b>${"a<b"}</b>`;
    expect(html`<p>${inner}</p>`.value).toBe("<p><b>a&lt;b</b></p>");
    expect(html`${raw("<hr>")}`.value).toBe("<hr>");
  });

  it("joins arrays without separators", () => {
    const items = ["one", "two"].map((i) => html`<li>${i}</li>`);
    expect(html`<ul>${items}</ul>`.value).toBe("<ul><li>one</li><li>two</li></ul>");
  });

  it("renders false, null and undefined as nothing", () => {
    const flag = false;
    expect(html`[${flag && html`<b>x</b>`}${null}${undefined}]`.value).toBe("[]");
  });

  it("renders numbers and true as text", () => {
    expect(html`${3}/${true}`.value).toBe("3/true");
  });

  it("returns a SafeHtml that stringifies to its markup", () => {
    const out = html`<i>${"x"}</i>`;
    expect(out).toBeInstanceOf(SafeHtml);
    expect(String(out)).toBe("<i>x</i>");
  });
});

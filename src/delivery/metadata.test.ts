import { describe, it, expect } from "vitest";
import {
  buildCaption,
  escapeHtml,
  sanitizePerformer,
  sanitizeTitle,
  CAPTION_MAX_LENGTH,
} from "./metadata";

describe("sanitizeTitle", () => {
  it("should strip control and illegal characters and collapse whitespace", () => {
    expect(sanitizeTitle("  Hello\u0007 <World>: part 1/2?  ")).toBe("Hello World part 1 2");
  });

  it("should fall back to the placeholder when nothing printable remains", () => {
    expect(sanitizeTitle("\u0000<>??")).toBe("Untitled");
    expect(sanitizeTitle("")).toBe("Untitled");
  });

  it("should truncate to 64 characters", () => {
    expect(sanitizeTitle("a".repeat(100))).toBe("a".repeat(64));
  });

  it("should count code points so emoji are not split", () => {
    const title = sanitizeTitle("🎵".repeat(70));

    expect(Array.from(title)).toHaveLength(64);
    expect(title).toBe("🎵".repeat(64));
  });

  it("should not leave trailing whitespace after truncation", () => {
    expect(sanitizeTitle(`${"a".repeat(63)} b`)).toBe("a".repeat(63));
  });
});

describe("sanitizePerformer", () => {
  it("should return null for a missing performer", () => {
    expect(sanitizePerformer(null)).toBeNull();
  });

  it("should return null rather than an empty string", () => {
    expect(sanitizePerformer("  \u0001 ")).toBeNull();
  });

  it("should clean a present performer", () => {
    expect(sanitizePerformer("Some | Channel")).toBe("Some Channel");
  });
});

describe("escapeHtml", () => {
  it("should escape the characters HTML parse mode reserves", () => {
    expect(escapeHtml(`<a href="x">&</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&amp;&lt;/a&gt;");
  });
});

describe("buildCaption", () => {
  it("should bold the escaped title and link the source", () => {
    expect(buildCaption("Tom & Jerry <live>", "https://www.youtube.com/watch?v=abc&t=1")).toBe(
      "<b>Tom &amp; Jerry &lt;live&gt;</b>\n\n<b>Source:</b> https://www.youtube.com/watch?v=abc&amp;t=1",
    );
  });

  it("should use the placeholder for an empty title", () => {
    expect(buildCaption("", "https://e.com/v")).toBe("<b>Untitled</b>\n\n<b>Source:</b> https://e.com/v");
  });

  it("should shorten a long title to fit the caption limit", () => {
    const caption = buildCaption("x".repeat(2000), "https://e.com/v");

    expect(caption.length).toBeLessThanOrEqual(CAPTION_MAX_LENGTH);
    expect(caption.startsWith("<b>xxx")).toBe(true);
    expect(caption.endsWith("…</b>\n\n<b>Source:</b> https://e.com/v")).toBe(true);
  });
});

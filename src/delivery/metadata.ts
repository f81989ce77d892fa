// pattern: Functional Core

export const TITLE_MAX_LENGTH = 64;
export const CAPTION_MAX_LENGTH = 1024;
export const TITLE_PLACEHOLDER = "Untitled";

// C0/C1 control characters plus the characters the transport rejects in
// file-derived title and performer fields.
const ILLEGAL_CHARS = /[\u0000-\u001f\u007f-\u009f<>:"/\\|?*]/g;

/**
 * Strips illegal characters, collapses whitespace and truncates to `maxLength`
 * code points. Returns "" when nothing printable remains.
 */
export function sanitizeField(raw: string, maxLength: number = TITLE_MAX_LENGTH): string {
  const cleaned = raw.replace(ILLEGAL_CHARS, " ").replace(/\s+/g, " ").trim();
  return Array.from(cleaned).slice(0, maxLength).join("").trim();
}

export function sanitizeTitle(raw: string): string {
  const title = sanitizeField(raw);
  return title === "" ? TITLE_PLACEHOLDER : title;
}

/** Returns the sanitized performer, or null so the field is left out entirely. */
export function sanitizePerformer(raw: string | null): string | null {
  if (raw === null) return null;
  const performer = sanitizeField(raw);
  return performer === "" ? null : performer;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * HTML caption: the full title in bold, then the source link. The title is
 * shortened first when the caption would exceed the transport limit.
 */
export function buildCaption(rawTitle: string, sourceUrl: string): string {
  const title = rawTitle.replace(/[\u0000-\u0008\u000b-\u001f\u007f-\u009f]/g, "").trim();
  const shownTitle = title === "" ? TITLE_PLACEHOLDER : title;
  const footer = `\n\n<b>Source:</b> ${escapeHtml(sourceUrl)}`;

  let chars = Array.from(shownTitle);
  let caption = `<b>${escapeHtml(shownTitle)}</b>${footer}`;
  while (caption.length > CAPTION_MAX_LENGTH && chars.length > 1) {
    chars = chars.slice(0, Math.max(1, chars.length - (caption.length - CAPTION_MAX_LENGTH)));
    caption = `<b>${escapeHtml(`${chars.join("").trimEnd()}…`)}</b>${footer}`;
  }
  return caption;
}

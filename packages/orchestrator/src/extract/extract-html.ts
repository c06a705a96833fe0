// Tried in order; the first non-empty match wins. A doctype span is tried before a
// bare <html> span so that the doctype is not cut off.
const HTML_PATTERNS: ReadonlyArray<RegExp> = [
  /```html\r?\n([\s\S]*?)\r?\n```/i,
  /```\r?\n(<!DOCTYPE html[\s\S]*?<\/html>)\r?\n```/i,
  /(<!DOCTYPE html[\s\S]*?<\/html>)/i,
  /(<html[\s\S]*?<\/html>)/i,
];

const HTML_SIGNATURE = /<html|<!DOCTYPE/i;

/**
 * Pulls the HTML document out of free-form model output. Returns `""` when
 * the text carries no document signature at all.
 */
export function extractHTML(text: string): string {
  for (const pattern of HTML_PATTERNS) {
    const inner = pattern.exec(text)?.[1]?.trim();
    if (inner) {
      return inner;
    }
  }

  if (HTML_SIGNATURE.test(text)) {
    return text.trim();
  }

  return '';
}

import { JSDOM } from "jsdom";
import type { HtmlSanitizer } from "./sanitizer.js";

/**
 * Sanitize an HTML fragment string.
 *
 * The fragment is parsed as body content of a fresh jsdom document (scripts
 * are never run), sanitized in place and serialized back.
 */
export function sanitizeHtml(html: string, sanitizer: HtmlSanitizer): string {
  const dom = new JSDOM("<!DOCTYPE html><html><head></head><body></body></html>");
  try {
    const { document } = dom.window;
    document.body.innerHTML = html;
    sanitizer.sanitize(document);
    return document.body.innerHTML;
  } finally {
    dom.window.close();
  }
}

import { Marked } from "marked";

const SAFE_SCHEMES = new Set(["http", "https", "mailto"]);

const marked = new Marked();
// Raw HTML in model output is shown as text, never injected into the page
marked.use({
  renderer: {
    html(token) {
      return escapeHtml(token.text);
    },
    link(token) {
      if (isSafeHref(token.href)) return false;
      return this.parser.parseInline(token.tokens);
    },
    image(token) {
      if (isSafeHref(token.href)) return false;
      return escapeHtml(token.text);
    },
  },
});

export function renderMarkdown(markdown: string): string {
  return marked.parse(markdown, { async: false });
}

/**
 * Relative links and http(s)/mailto URLs pass; any other scheme
 * (javascript:, data:, vbscript:) is dropped and only the text remains.
 */
export function isSafeHref(href: string): boolean {
  // Browsers ignore whitespace and control characters inside a scheme
  const compact = href.replace(/[\u0000- ]/g, "");
  const scheme = /^([a-z][a-z0-9+.-]*):/i.exec(compact)?.[1];
  return scheme === undefined || SAFE_SCHEMES.has(scheme.toLowerCase());
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

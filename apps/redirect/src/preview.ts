/**
 * Rich-preview page for slugs that carry OGP metadata.
 *
 * Crawlers read the og: tags; browsers follow the meta refresh.
 */

import type { OGP } from "@shortpage/shared";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export function renderPreview(url: string, ogp: OGP): string {
  const href = escapeHtml(url);
  const title = escapeHtml(ogp.title);

  return [
    "<!DOCTYPE html>",
    "<html>",
    "<head>",
    '<meta charset="utf-8">',
    `<title>${title}</title>`,
    `<meta property="og:title" content="${title}">`,
    `<meta property="og:image" content="${escapeHtml(ogp.image)}">`,
    `<meta property="og:description" content="${escapeHtml(ogp.description)}">`,
    `<meta property="og:url" content="${href}">`,
    `<meta http-equiv="refresh" content="0; url=${href}">`,
    "</head>",
    "<body>",
    `<p>Redirecting to <a href="${href}">${href}</a></p>`,
    "</body>",
    "</html>",
  ].join("\n");
}

/**
 * @file src/anki/field-converters.ts
 * @summary Default FieldConverter implementations for the two sync directions: markdown
 * fields → Anki HTML on import, Anki HTML → markdown on export. Conversion is regex based
 * and covers the formatting that flashcards use in practice (emphasis, code, lists,
 * tables, links, images, line breaks); anything else passes through as HTML.
 *
 * @exports
 *  - markdownToHtml          - markdown field text → HTML
 *  - htmlToMarkdown          - HTML field value → markdown
 *  - MarkdownToHtmlConverter - FieldConverter wrapping markdownToHtml
 *  - HtmlToMarkdownConverter - FieldConverter wrapping htmlToMarkdown
 *  - identityConverter       - FieldConverter that returns its input
 */

import { CODE_FENCE_RE } from "../core/constants";
import type { FieldConverter } from "../types/note";

function escapeHtml(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

// ═══════════════════════════════════════════════════════════════════════════════
//  Markdown → HTML
// ═══════════════════════════════════════════════════════════════════════════════

const CODE_SPAN_TOKEN = "\x00";

function inlineToHtml(line: string): string {
  // Code spans are lifted out first so emphasis markers inside them survive.
  const spans: string[] = [];
  let text = line.replace(/`([^`\n]+)`/g, (_m: string, code: string) => {
    spans.push(`<code>${escapeHtml(code)}</code>`);
    return `${CODE_SPAN_TOKEN}${spans.length - 1}${CODE_SPAN_TOKEN}`;
  });

  // Bold: **text** → <b>text</b>
  text = text.replace(/\*\*(.+?)\*\*/g, "<b>$1</b>");

  // Italic: *text* → <i>text</i>  (single asterisk)
  text = text.replace(/(?<!\*)\*(?!\*)(.+?)(?<!\*)\*(?!\*)/g, "<i>$1</i>");

  // Italic: _text_ → <i>text</i>, not inside words
  text = text.replace(/(?<![\w\\])_(.+?)_(?![\w])/g, "<i>$1</i>");

  // Strikethrough: ~~text~~ → <s>text</s>
  text = text.replace(/~~(.+?)~~/g, "<s>$1</s>");

  // Highlight: ==text== → <mark>text</mark>
  text = text.replace(/==(.+?)==/g, "<mark>$1</mark>");

  return text.replace(/\x00(\d+)\x00/g, (_m: string, idx: string) => spans[Number(idx)] ?? "");
}

/**
 * Convert markdown field text to Anki HTML. Fenced code blocks become
 * `<pre><code>` with escaped content; every other line gets inline formatting
 * and lines are joined with `<br>`. An unclosed fence runs to the end.
 */
export function markdownToHtml(md: string): string {
  if (!md) return "";

  const parts: string[] = [];
  let textLines: string[] = [];
  let codeLines: string[] | null = null;

  const flushText = () => {
    if (textLines.length) parts.push(textLines.map(inlineToHtml).join("<br>"));
    textLines = [];
  };
  const flushCode = () => {
    if (codeLines) parts.push(`<pre><code>${escapeHtml(codeLines.join("\n"))}</code></pre>`);
    codeLines = null;
  };

  for (const line of md.split(/\r?\n/)) {
    if (CODE_FENCE_RE.test(line.trimStart())) {
      if (codeLines) {
        flushCode();
      } else {
        flushText();
        codeLines = [];
      }
      continue;
    }
    if (codeLines) codeLines.push(line);
    else textLines.push(line);
  }

  flushText();
  flushCode();
  return parts.join("");
}

// ═══════════════════════════════════════════════════════════════════════════════
//  HTML → Markdown
// ═══════════════════════════════════════════════════════════════════════════════

function block(markdown: string): string {
  return `\n${markdown}\n`;
}

function stripTags(s: string): string {
  return s.replace(/<[^>]+>/g, "");
}

function decodeEntities(s: string): string {
  return s
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#(?:39|x27);/g, "'")
    .replace(/&nbsp;/g, " ")
    .replace(/&#(\d+);/g, (_m: string, code: string) => String.fromCharCode(Number(code)))
    .replace(/&amp;/g, "&");
}

/**
 * Replacer for `<(tag)>(content)</tag>` matches. Pads with a space where the
 * marker would otherwise touch a word character.
 */
function emphasis(marker: string) {
  return (match: string, _tag: string, content: string, offset: number, full: string): string => {
    const inner = content.trim();
    if (!inner) return "";
    const pad = (c: string | undefined) => (c !== undefined && /\w/.test(c) ? " " : "");
    return pad(full[offset - 1]) + marker + inner + marker + pad(full[offset + match.length]);
  };
}

function listItems(html: string): string[] {
  return Array.from(html.matchAll(/<li[^>]*>([\s\S]*?)<\/li>/gi), (m) => stripTags(m[1] ?? "").trim());
}

function tableToMarkdown(html: string): string {
  const rows = Array.from(html.matchAll(/<tr[^>]*>([\s\S]*?)<\/tr>/gi), (tr) =>
    Array.from((tr[1] ?? "").matchAll(/<t[dh][^>]*>([\s\S]*?)<\/t[dh]>/gi), (cell) =>
      stripTags(cell[1] ?? "").trim(),
    ),
  ).filter((cells) => cells.length > 0);

  const [head, ...body] = rows;
  if (!head) return "";
  const row = (cells: string[]) => `| ${cells.join(" | ")} |`;
  return block([row(head), row(head.map(() => "---")), ...body.map(row)].join("\n"));
}

/**
 * Convert an Anki HTML field value to markdown. `<u>`, `<sub>` and `<sup>`
 * have no markdown syntax and are kept as HTML; other tags are dropped.
 */
export function htmlToMarkdown(html: string): string {
  if (!html) return "";

  const text = html
    // Blocks
    .replace(/<h([1-6])[^>]*>([\s\S]*?)<\/h\1>/gi, (_m: string, level: string, content: string) =>
      block(`${"#".repeat(Number(level))} ${stripTags(content).trim()}`),
    )
    .replace(/<hr\s*\/?>/gi, block("***"))
    .replace(/<blockquote[^>]*>([\s\S]*?)<\/blockquote>/gi, (_m: string, content: string) =>
      block(stripTags(content).trim().split("\n").map((l) => `> ${l}`).join("\n")),
    )
    .replace(/<pre[^>]*>([\s\S]*?)<\/pre>/gi, (_m: string, content: string) =>
      block("```\n" + stripTags(content).trim() + "\n```"),
    )
    .replace(/<table[^>]*>([\s\S]*?)<\/table>/gi, (_m: string, content: string) => tableToMarkdown(content))
    .replace(/<ol[^>]*>([\s\S]*?)<\/ol>/gi, (_m: string, content: string) =>
      block(listItems(content).map((item, i) => `${i + 1}. ${item}`).join("\n")),
    )
    .replace(/<ul[^>]*>([\s\S]*?)<\/ul>/gi, (_m: string, content: string) =>
      block(listItems(content).map((item) => `- ${item}`).join("\n")),
    )
    // Inline
    .replace(/<(b|strong)(?:\s[^>]*)?>([\s\S]*?)<\/\1>/gi, emphasis("**"))
    .replace(/<(i|em)(?:\s[^>]*)?>([\s\S]*?)<\/\1>/gi, emphasis("*"))
    .replace(/<(s|strike|del)(?:\s[^>]*)?>([\s\S]*?)<\/\1>/gi, emphasis("~~"))
    .replace(/<code(?:\s[^>]*)?>([\s\S]*?)<\/code>/gi, "`$1`")
    .replace(/<mark(?:\s[^>]*)?>([\s\S]*?)<\/mark>/gi, "==$1==")
    .replace(/<img\s+[^>]*src=["']([^"']+)["'][^>]*>/gi, "![]($1)")
    .replace(/<a\s+[^>]*href=["']([^"']+)["'][^>]*>([\s\S]*?)<\/a>/gi, "[$2]($1)")
    // Line structure
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/div>\s*<div[^>]*>/gi, "\n")
    .replace(/<\/p>\s*<p[^>]*>/gi, "\n\n")
    .replace(/<\/?(?:div|p)\b[^>]*>/gi, "\n")
    // Everything else except <u>, <sub>, <sup>
    .replace(/<(?!\/?(?:u|sub|sup)>)[^>]+>/gi, "");

  return decodeEntities(text).replace(/\n{3,}/g, "\n\n").trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
//  Converters
// ═══════════════════════════════════════════════════════════════════════════════

export class MarkdownToHtmlConverter implements FieldConverter {
  convert(raw: string): string {
    return markdownToHtml(raw);
  }
}

export class HtmlToMarkdownConverter implements FieldConverter {
  convert(raw: string): string {
    return htmlToMarkdown(raw);
  }
}

export const identityConverter: FieldConverter = {
  convert: (raw: string) => raw,
};

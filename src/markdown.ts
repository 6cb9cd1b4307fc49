import { decode } from "html-entities";

/**
 * Convert rendered page HTML to Markdown using regex passes.
 * Good enough for article bodies handed to a summarizer; not a general
 * purpose converter.
 */
export function htmlToMarkdown(html: string): string {
  let result = html;

  // Non-content blocks
  result = result.replace(/<!--[\s\S]*?-->/g, "");
  result = result.replace(/<(script|style|head|noscript|template)\b[^>]*>[\s\S]*?<\/\1>/gi, "");

  // Headings
  result = result.replace(
    /<h([1-6])\b[^>]*>([\s\S]*?)<\/h\1>/gi,
    (_match: string, level: string, text: string) => `\n\n${"#".repeat(Number(level))} ${text.trim()}\n\n`
  );

  // Links, dropping dangerous protocols
  result = result.replace(
    /<a\s+[^>]*href="([^"]*)"[^>]*>([\s\S]*?)<\/a>/gi,
    (_match: string, url: string, text: string) => {
      if (/^\s*(javascript|data|vbscript):/i.test(url)) {
        return text;
      }
      return `[${text}](${url})`;
    }
  );

  // Inline formatting
  result = result.replace(/<(strong|b)\b[^>]*>([\s\S]*?)<\/\1>/gi, "**$2**");
  result = result.replace(/<(em|i)\b[^>]*>([\s\S]*?)<\/\1>/gi, "*$2*");
  result = result.replace(/<code\b[^>]*>([\s\S]*?)<\/code>/gi, "`$1`");

  // Block structure
  result = result.replace(/<li\b[^>]*>/gi, "\n- ");
  result = result.replace(/<\/(ul|ol)>/gi, "\n\n");
  result = result.replace(/<br\s*\/?>/gi, "\n");
  result = result.replace(/<hr\s*\/?>/gi, "\n\n---\n\n");
  result = result.replace(/<\/(p|div|section|article|blockquote|pre|table|tr)>/gi, "\n\n");

  // Everything else keeps only its inner text
  result = result.replace(/<[^>]+>/g, "");

  result = decode(result);

  result = result.replace(/[ \t]+\n/g, "\n");
  result = result.replace(/\n{3,}/g, "\n\n");

  return result.trim();
}

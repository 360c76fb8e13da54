/**
 * Markdown heading helpers shared by title resolution and the formatter
 */

const H1_PATTERN = /^ {0,3}#[ \t]+(.+?)(?:[ \t]+#+)?[ \t]*$/;
const FENCE_PATTERN = /^ {0,3}(`{3,}|~{3,})/;

/**
 * Text of an H1 line, or null when the line is not a top-level ATX heading
 */
export function parseH1(line: string): string | null {
  const match = H1_PATTERN.exec(line);
  if (!match) return null;
  const text = match[1].trim();
  return text === '' ? null : text;
}

/**
 * Follows fenced code blocks line by line
 */
export class FenceTracker {
  private fence: string | null = null;

  /**
   * Feed the next line; true when it opens, closes or sits inside a fence
   */
  consume(line: string): boolean {
    const fenceMatch = FENCE_PATTERN.exec(line);
    if (fenceMatch) {
      const marker = fenceMatch[1];
      if (this.fence === null) {
        this.fence = marker;
      } else if (marker[0] === this.fence[0] && marker.length >= this.fence.length) {
        this.fence = null;
      }
      return true;
    }
    return this.fence !== null;
  }
}

/**
 * First H1 in the document, skipping fenced code blocks
 */
export function findFirstH1(markdown: string): string | null {
  const fences = new FenceTracker();

  for (const line of markdown.split(/\r?\n/)) {
    if (fences.consume(line)) continue;

    const heading = parseH1(line);
    if (heading !== null) return heading;
  }

  return null;
}

/**
 * H1 the document opens with (ignoring leading blank lines), with the offset
 * just past that heading line.
 */
export function findLeadingH1(markdown: string): { text: string; end: number } | null {
  const match = /^(?:[ \t]*\r?\n)*([^\r\n]*)(\r?\n|$)/.exec(markdown);
  if (!match) return null;
  const text = parseH1(match[1]);
  if (text === null) return null;
  return { text, end: match[0].length };
}

/**
 * Case- and whitespace-insensitive form used to compare titles
 */
export function normalizeTitle(title: string): string {
  return title.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function titlesMatch(a: string, b: string): boolean {
  return normalizeTitle(a) === normalizeTitle(b);
}

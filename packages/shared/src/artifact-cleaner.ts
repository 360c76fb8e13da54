/**
 * Removes typographic artifacts typical of AI-generated text: emoji, smart
 * punctuation and invisible characters. No replacement yields a character
 * that is itself replaced, so cleaning twice equals cleaning once.
 */

const REPLACEMENTS: ReadonlyMap<number, string> = new Map([
  // Smart double quotes
  [0x201c, '"'],
  [0x201d, '"'],
  [0x201e, '"'],
  [0x201f, '"'],
  // Smart single quotes / apostrophe
  [0x2018, "'"],
  [0x2019, "'"],
  [0x201a, "'"],
  [0x201b, "'"],
  // Dashes
  [0x2014, '--'],
  [0x2013, '-'],
  // Ellipsis
  [0x2026, '...'],
  // No-break space
  [0x00a0, ' '],
  // Zero-width space, non-joiner, joiner, word joiner, BOM
  [0x200b, ''],
  [0x200c, ''],
  [0x200d, ''],
  [0x2060, ''],
  [0xfeff, ''],
]);

const EMOJI_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1f000, 0x1faff], // Mahjong through Symbols and Pictographs Extended-A
  [0x2600, 0x27bf], // Miscellaneous Symbols, Dingbats
  [0x2b00, 0x2bff], // Miscellaneous Symbols and Arrows
  [0x2190, 0x21ff], // Arrows
  [0x231a, 0x231b], // Watch, hourglass
  [0x238c, 0x2454], // Miscellaneous Technical tail through Control Pictures
  [0x24c2, 0x24c2], // Circled M
  [0x25a0, 0x25ff], // Geometric Shapes
  [0xfe00, 0xfe0f], // Variation selectors
  [0xe0020, 0xe007f], // Tag characters (flag sequences)
  [0x20d0, 0x20ff], // Combining marks for symbols, including the keycap
];

export function isEmojiCodePoint(codePoint: number): boolean {
  return EMOJI_RANGES.some(([start, end]) => codePoint >= start && codePoint <= end);
}

export function cleanAiArtifacts(text: string): string {
  let result = '';

  for (const char of text) {
    const codePoint = char.codePointAt(0) ?? 0;
    if (isEmojiCodePoint(codePoint)) continue;

    const replacement = REPLACEMENTS.get(codePoint);
    result += replacement ?? char;
  }

  return result;
}

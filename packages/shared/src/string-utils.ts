/**
 * Turns an identifier into a file-name-safe slug: ASCII only, lowercase,
 * whitespace and dashes collapsed to underscores.
 */
export const slugify = (value: string): string => {
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^\x00-\x7f]/g, '')
    .replace(/[\s-]+/g, '_')
    .replace(/[^\w]/g, '')
    .toLowerCase()
    .replace(/^_+|_+$/g, '');
};

/**
 * Keeps the head and tail of a long text, marking the omitted middle.
 */
export function truncateMiddle(
  text: string,
  head: number,
  tail: number,
): { text: string; truncated: boolean } {
  if (text.length <= head + tail) {
    return { text, truncated: false };
  }
  const omitted = text.length - head - tail;
  return {
    text: `${text.slice(0, head)}\n... [${omitted} chars truncated] ...\n${text.slice(text.length - tail)}`,
    truncated: true,
  };
}

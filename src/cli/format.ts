import chalk, { type ChalkInstance } from 'chalk';

const HIGHLIGHT_RE = /(<thinking>[\s\S]*?<\/thinking>)|(<tool_code>[\s\S]*?<\/tool_code>)/g;

/** Colors `<thinking>` blocks blue and `<tool_code>` blocks yellow; other text is left as is. */
export function formatResponse(response: string, painter: ChalkInstance = chalk): string {
  const parts: string[] = [];
  let lastEnd = 0;

  for (const match of response.matchAll(HIGHLIGHT_RE)) {
    const start = match.index ?? 0;
    if (start > lastEnd) {
      parts.push(response.slice(lastEnd, start));
    }
    const [text, thinking] = match;
    parts.push(thinking !== undefined ? painter.blue(text) : `${painter.yellow(text)}\n`);
    lastEnd = start + text.length;
  }

  if (lastEnd < response.length) {
    parts.push(response.slice(lastEnd));
  }
  return parts.join('\n');
}

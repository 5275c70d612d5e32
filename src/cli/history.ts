import fs from 'fs/promises';

export const DEFAULT_HISTORY_FILE = '__history';
export const HISTORY_SIZE = 500;

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads the input history file (one entry per line, oldest first) and
 * returns it newest first, the order readline keeps.
 */
export async function loadHistory(file: string, size = HISTORY_SIZE): Promise<string[]> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (isMissing(error)) {
      return [];
    }
    throw error;
  }
  return text
    .split('\n')
    .filter(line => line.trim() !== '')
    .reverse()
    .slice(0, size);
}

/** Writes readline's newest-first history back out oldest first. */
export async function saveHistory(file: string, history: readonly string[], size = HISTORY_SIZE): Promise<void> {
  const lines = history.slice(0, size).reverse();
  await fs.writeFile(file, lines.length > 0 ? `${lines.join('\n')}\n` : '');
}

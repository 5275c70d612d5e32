import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { PersistenceError, errorMessage } from '../core/errors.js';
import type { ChatMessage, PersistedSession } from '../core/types.js';

export type { PersistedSession };

const PersistedSessionSchema = z.object({
  id: z.string(),
  messages: z.array(z.object({
    role: z.enum(['system', 'user', 'assistant']),
    content: z.string()
  })),
  created_at: z.string()
});

const SESSION_EXT = '.json';

/** One pretty-printed JSON file per session, named `<id>.json`. */
export class FileSessionStore {
  constructor(private readonly dir: string) {}

  get directory(): string {
    return this.dir;
  }

  async save(id: string, messages: readonly ChatMessage[]): Promise<PersistedSession> {
    const file = this.pathFor(id);
    const record: PersistedSession = {
      id,
      messages: messages.map(m => ({ role: m.role, content: m.content })),
      created_at: new Date().toISOString()
    };

    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(file, JSON.stringify(record, null, 2));
    } catch (error) {
      throw new PersistenceError(`Failed to save session '${id}': ${errorMessage(error)}`);
    }
    return record;
  }

  async load(id: string): Promise<PersistedSession> {
    const file = this.pathFor(id);

    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(file, 'utf-8'));
    } catch (error) {
      throw new PersistenceError(`Failed to load session '${id}': ${errorMessage(error)}`);
    }

    const parsed = PersistedSessionSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new PersistenceError(
        `Session '${id}' is malformed: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim()
      );
    }
    return parsed.data;
  }

  /** Saved session names, sorted. A missing directory lists nothing. */
  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw new PersistenceError(`Failed to list sessions: ${errorMessage(error)}`);
    }

    return entries
      .filter(name => name.endsWith(SESSION_EXT))
      .map(name => name.slice(0, -SESSION_EXT.length))
      .sort();
  }

  private pathFor(id: string): string {
    if (!id || id.includes('/') || id.includes('\\') || id === '.' || id === '..') {
      throw new PersistenceError(`Invalid session name: '${id}'`);
    }
    return path.join(this.dir, `${id}${SESSION_EXT}`);
  }
}

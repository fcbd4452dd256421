import { randomUUID } from 'crypto';
import fsp from 'fs/promises';
import path from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import { DocumentWriteError, isNotFoundError, toError } from './errors.js';
import type { Logger } from './logger.js';

export interface DocumentDefinition<T> {
  name: string;
  path: string;
  schema: ZodType<T, ZodTypeDef, unknown>;
  defaults: () => T;
}

export type LoadResult<T> =
  | { kind: 'found'; document: T }
  | { kind: 'absent' }
  | { kind: 'malformed'; error: Error };

export interface DocumentChange<T, R> {
  next: T;
  result: R;
}

/**
 * File-backed JSON documents.
 *
 * Saves go through a temp file beside the target and a rename, so readers only
 * ever see a complete document. `update` serializes load-mutate-save cycles per
 * path within this process; separate processes sharing the files still race.
 */
export class DocumentStore {
  private readonly queues = new Map<string, Promise<unknown>>();

  constructor(private readonly logger: Logger) {}

  async read<T>(doc: DocumentDefinition<T>): Promise<LoadResult<T>> {
    let raw: string;
    try {
      raw = await fsp.readFile(doc.path, 'utf8');
    } catch (error) {
      if (isNotFoundError(error)) return { kind: 'absent' };
      return { kind: 'malformed', error: toError(error) };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      return { kind: 'malformed', error: toError(error) };
    }

    const result = doc.schema.safeParse(parsed);
    if (!result.success) return { kind: 'malformed', error: result.error };
    return { kind: 'found', document: result.data };
  }

  async load<T>(doc: DocumentDefinition<T>): Promise<T> {
    const result = await this.read(doc);
    switch (result.kind) {
      case 'found':
        return result.document;
      case 'malformed':
        this.logger.warn({ document: doc.name, path: doc.path, err: result.error }, `Error loading ${doc.path}, using defaults`);
        return doc.defaults();
      case 'absent':
        return doc.defaults();
    }
  }

  async save<T>(doc: DocumentDefinition<T>, document: T): Promise<void> {
    try {
      await fsp.mkdir(path.dirname(doc.path), { recursive: true });
    } catch (error) {
      throw new DocumentWriteError(doc.name, doc.path, error);
    }

    const tempPath = `${doc.path}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await fsp.writeFile(tempPath, JSON.stringify(document, null, 2), 'utf8');
      await fsp.rename(tempPath, doc.path);
    } catch (error) {
      await fsp.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn({ err: cleanupError, path: tempPath }, 'Could not remove temporary file');
      });
      throw new DocumentWriteError(doc.name, doc.path, error);
    }
  }

  /** Load, apply `change`, save. Nothing is written when `change` throws. */
  update<T, R>(
    doc: DocumentDefinition<T>,
    change: (current: T) => DocumentChange<T, R> | Promise<DocumentChange<T, R>>
  ): Promise<R> {
    return this.serialize(doc.path, async () => {
      const current = await this.load(doc);
      const { next, result } = await change(current);
      await this.save(doc, next);
      return result;
    });
  }

  /** Writes the default document when none exists yet. Returns true if it did. */
  ensure<T>(doc: DocumentDefinition<T>): Promise<boolean> {
    return this.serialize(doc.path, async () => {
      const result = await this.read(doc);
      if (result.kind !== 'absent') return false;
      await this.save(doc, doc.defaults());
      return true;
    });
  }

  private serialize<R>(filePath: string, run: () => Promise<R>): Promise<R> {
    const key = path.resolve(filePath);
    const previous = this.queues.get(key) ?? Promise.resolve();
    // A failed cycle was already reported to its own caller; the queue moves on.
    const next = previous.catch(() => undefined).then(run);
    this.queues.set(key, next);
    return next;
  }
}

/**
 * Index pipeline tests: temp directory in, in-memory SQLite out.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type Database from 'better-sqlite3';

import { runIndexPipeline, IndexingCancelledError } from '../pipeline.js';
import type { EmbeddingProvider } from '../embedder/types.js';
import { openDb, runMigrations, DatabaseOperations } from '../../database/index.js';
import { ConfigError } from '../../errors/index.js';

function fakeProvider(model = 'fake-embed', fail: (text: string) => boolean = () => false): EmbeddingProvider {
  return {
    model,
    embed: (texts: string[]) =>
      texts.some(fail)
        ? Promise.reject(new Error('cannot embed'))
        : Promise.resolve(texts.map((text) => [text.length, 1, 0])),
  };
}

let root: string;
let db: Database.Database;
let ops: DatabaseOperations;

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'medqa-index-'));
  writeFileSync(join(root, 'cold.md'), '感冒多由病毒引起。\n\n注意休息，多喝水。');
  writeFileSync(join(root, 'gout.txt'), '痛风与尿酸升高有关。');
  db = openDb(':memory:');
  runMigrations(db);
  ops = new DatabaseOperations(db);
});

afterEach(() => {
  db.close();
  rmSync(root, { recursive: true, force: true });
});

describe('runIndexPipeline', () => {
  it('stores one passage per chunk with its source', async () => {
    const result = await runIndexPipeline({ rootPath: root, embeddingProvider: fakeProvider(), database: ops });

    expect(result.filesIndexed).toBe(2);
    expect(result.chunksCreated).toBe(2);
    expect(result.chunksStored).toBe(2);
    expect(result.embeddingDimensions).toBe(3);
    expect(ops.listSources()).toEqual([
      { source: 'cold.md', count: 1 },
      { source: 'gout.txt', count: 1 },
    ]);
    expect(ops.getInfo().embeddingModel).toBe('fake-embed');
    expect(ops.loadPassages()[0]?.content).toBe('感冒多由病毒引起。\n\n注意休息，多喝水。');
  });

  it('replaces passages when a directory is indexed again', async () => {
    await runIndexPipeline({ rootPath: root, embeddingProvider: fakeProvider(), database: ops });
    await runIndexPipeline({ rootPath: root, embeddingProvider: fakeProvider(), database: ops });

    expect(ops.countPassages()).toBe(2);
  });

  it('refuses to mix embedding models without --rebuild', async () => {
    await runIndexPipeline({ rootPath: root, embeddingProvider: fakeProvider('model-a'), database: ops });

    await expect(
      runIndexPipeline({ rootPath: root, embeddingProvider: fakeProvider('model-b'), database: ops })
    ).rejects.toBeInstanceOf(ConfigError);

    const rebuilt = await runIndexPipeline({
      rootPath: root,
      embeddingProvider: fakeProvider('model-b'),
      database: ops,
      rebuild: true,
    });
    expect(rebuilt.chunksStored).toBe(2);
    expect(ops.getInfo().embeddingModel).toBe('model-b');
  });

  it('records chunks that could not be embedded', async () => {
    const onError = vi.fn();

    const result = await runIndexPipeline({
      rootPath: root,
      embeddingProvider: fakeProvider('fake-embed', (text) => text.includes('痛风')),
      database: ops,
      onError,
    });

    expect(result.chunksStored).toBe(1);
    expect(result.errors).toHaveLength(1);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(ops.listSources()).toEqual([{ source: 'cold.md', count: 1 }]);
  });

  it('fires stage callbacks in order', async () => {
    const stages: string[] = [];

    await runIndexPipeline({
      rootPath: root,
      embeddingProvider: fakeProvider(),
      database: ops,
      onStageComplete: (stage) => stages.push(stage),
    });

    expect(stages).toEqual(['scanning', 'chunking', 'embedding', 'storing']);
  });

  it('stops when cancelled before starting', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      runIndexPipeline({ rootPath: root, embeddingProvider: fakeProvider(), database: ops, signal: controller.signal })
    ).rejects.toBeInstanceOf(IndexingCancelledError);
    expect(ops.countPassages()).toBe(0);
  });
});

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { FetchError } from '../../src/core/errors.js';
import { githubBlobToRaw, isUrl, loadEggJson } from '../../src/core/source/index.js';

describe('isUrl', () => {
  it('recognizes http and https only', () => {
    expect(isUrl('https://example.test/egg.json')).toBe(true);
    expect(isUrl('http://example.test/egg.json')).toBe(true);
    expect(isUrl('ftp://example.test/egg.json')).toBe(false);
    expect(isUrl('./eggs/paper.json')).toBe(false);
    expect(isUrl('C:\\eggs\\paper.json')).toBe(false);
  });
});

describe('githubBlobToRaw', () => {
  it('rewrites blob page URLs to raw content URLs', () => {
    expect(githubBlobToRaw('https://github.com/example/game-eggs/blob/main/minecraft/java/paper/egg-paper.json')).toBe(
      'https://raw.githubusercontent.com/example/game-eggs/main/minecraft/java/paper/egg-paper.json'
    );
  });

  it('leaves other URLs alone', () => {
    const raw = 'https://raw.githubusercontent.com/example/game-eggs/main/egg.json';
    expect(githubBlobToRaw(raw)).toBe(raw);
    expect(githubBlobToRaw('https://github.com/example/game-eggs/tree/main/eggs')).toBe(
      'https://github.com/example/game-eggs/tree/main/eggs'
    );
    expect(githubBlobToRaw('https://github.com/example/game-eggs')).toBe('https://github.com/example/game-eggs');
  });
});

describe('loadEggJson from disk', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'kubeegg-source-'));
    await writeFile(path.join(dir, 'egg.json'), JSON.stringify({ name: 'Paper' }));
    await writeFile(path.join(dir, 'bad.json'), '{ not json');
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads and parses a JSON file', async () => {
    const file = path.join(dir, 'egg.json');
    await expect(loadEggJson(file)).resolves.toEqual({
      data: { name: 'Paper' },
      source: file,
      resolvedSource: file,
    });
  });

  it('reports a missing file', async () => {
    const file = path.join(dir, 'missing.json');
    await expect(loadEggJson(file)).rejects.toThrow(`File not found: ${file}`);
  });

  it('reports a directory as unreadable', async () => {
    await expect(loadEggJson(dir)).rejects.toThrow(`Unable to read file: ${dir}`);
  });

  it('reports invalid JSON', async () => {
    const file = path.join(dir, 'bad.json');
    await expect(loadEggJson(file)).rejects.toThrow(`File ${file} is not valid JSON`);
  });
});

describe('loadEggJson over HTTP', () => {
  const blob = 'https://github.com/example/game-eggs/blob/main/egg.json';
  const raw = 'https://raw.githubusercontent.com/example/game-eggs/main/egg.json';

  it('fetches the raw URL for a blob page', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(JSON.stringify({ name: 'Paper' })));

    const result = await loadEggJson(blob, { fetchImpl, timeoutMs: 1000 });

    expect(result).toEqual({ data: { name: 'Paper' }, source: blob, resolvedSource: raw });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe(raw);
  });

  it('maps HTTP errors to FetchError', async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      async () => new Response('missing', { status: 404, statusText: 'Not Found' })
    );
    await expect(loadEggJson(raw, { fetchImpl })).rejects.toThrow(
      `Failed to fetch egg JSON from ${raw}: HTTP 404 Not Found`
    );
  });

  it('maps network failures to FetchError', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });
    const failure = loadEggJson(raw, { fetchImpl });
    await expect(failure).rejects.toBeInstanceOf(FetchError);
    await expect(failure).rejects.toThrow(`Failed to fetch egg JSON from ${raw}: fetch failed`);
  });

  it('rejects a response that is not JSON', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('<html></html>'));
    await expect(loadEggJson(raw, { fetchImpl })).rejects.toThrow(`Response from ${raw} is not valid JSON`);
  });
});

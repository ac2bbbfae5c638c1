import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { AssetPipeline, imagePath, imagesDir, type AssetPipelineOptions } from '../assetPipeline.js';
import { createLimit } from '../../harvest/scheduler.js';
import { fingerprint } from '../../harvest/dedup.js';
import type { AcceptedRecord } from '../../harvest/types.js';
import type { ImageClassifier } from '../../safety/classifier.js';
import { ClassifierError } from '../../shared/errors.js';
import { candidate } from '../../harvest/__tests__/fakes.js';

let tmpDir: string;

function accepted(id: string): AcceptedRecord {
  return { ...candidate(id), fingerprint: fingerprint(id) };
}

function okFetch() {
  return vi.fn(async (_url: string, _init?: RequestInit) => new Response('jpeg-bytes'));
}

function pipeline(overrides: Partial<AssetPipelineOptions> = {}): AssetPipeline {
  return new AssetPipeline({
    outputRoot: tmpDir,
    downloadLimit: createLimit(10),
    classifier: null,
    fetchTimeoutMs: 1000,
    userAgent: 'test-agent',
    referer: 'https://www.pinterest.com/',
    fetchImpl: okFetch(),
    ...overrides,
  });
}

function staticClassifier(verdict: () => Promise<{ unsafe: boolean; score: number }>): ImageClassifier {
  return { name: 'static', scoreImage: verdict };
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pinharvest-assets-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('imagePath', () => {
  it('places images under category/topic_slug/images', () => {
    expect(imagesDir('/out', 'STUDY_ACADEMIA', 'dark academia')).toBe('/out/STUDY_ACADEMIA/dark_academia/images');
    expect(imagePath('/out', accepted('123'))).toBe('/out/STUDY_ACADEMIA/dark_academia/images/123.jpg');
  });
});

describe('AssetPipeline', () => {
  it('fetches the originals URL and writes the bytes', async () => {
    const fetchImpl = okFetch();
    const stats = await pipeline({ fetchImpl }).downloadBatch([accepted('a')]);

    expect(stats.saved).toBe(1);
    expect(stats.outcomes).toEqual([
      { sourceItemId: 'a', path: imagePath(tmpDir, accepted('a')), outcome: 'saved' },
    ]);
    expect(fs.readFileSync(imagePath(tmpDir, accepted('a')), 'utf-8')).toBe('jpeg-bytes');
    expect(fetchImpl).toHaveBeenCalledWith(
      'https://i.pinimg.com/originals/aa/bb/a.jpg',
      expect.objectContaining({
        headers: { 'User-Agent': 'test-agent', Referer: 'https://www.pinterest.com/' },
      }),
    );
  });

  it('leaves no partial files behind', async () => {
    await pipeline().downloadBatch([accepted('a'), accepted('b')]);
    const files = fs.readdirSync(imagesDir(tmpDir, 'STUDY_ACADEMIA', 'dark academia')).sort();
    expect(files).toEqual(['a.jpg', 'b.jpg']);
  });

  it('skips images already on disk without fetching', async () => {
    const records = [accepted('a'), accepted('b')];
    await pipeline().downloadBatch(records);

    const fetchImpl = okFetch();
    const stats = await pipeline({ fetchImpl }).downloadBatch(records);

    expect(stats.skippedExisting).toBe(2);
    expect(stats.saved).toBe(0);
    expect(fetchImpl).not.toHaveBeenCalled();
    expect(fs.readFileSync(imagePath(tmpDir, accepted('a')), 'utf-8')).toBe('jpeg-bytes');
  });

  it('fetches unsaved items again on a re-run', async () => {
    const echoFetch = () => vi.fn(async (url: string, _init?: RequestInit) => new Response(url));
    const classifier: ImageClassifier = {
      name: 'rejects-b',
      scoreImage: async (bytes) => {
        const unsafe = new TextDecoder().decode(bytes).endsWith('/b.jpg');
        return { unsafe, score: unsafe ? 0.9 : 0.1 };
      },
    };
    const records = [accepted('a'), accepted('b')];

    const first = await pipeline({ fetchImpl: echoFetch(), classifier }).downloadBatch(records);
    expect(first.outcomes.map((o) => o.outcome)).toEqual(['saved', 'filtered_unsafe']);

    const fetchImpl = echoFetch();
    const second = await pipeline({ fetchImpl, classifier }).downloadBatch(records);

    expect(second.outcomes.map((o) => o.outcome)).toEqual(['skipped_existing', 'filtered_unsafe']);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe('https://i.pinimg.com/originals/aa/bb/b.jpg');
  });

  it('reports failed fetches without writing', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => new Response('missing', { status: 404 }));
    const stats = await pipeline({ fetchImpl }).downloadBatch([accepted('a')]);

    expect(stats.failedFetch).toBe(1);
    expect(stats.outcomes[0]?.outcome).toBe('failed_fetch');
    expect(stats.outcomes[0]?.error).toBe('HTTP 404');
    expect(fs.existsSync(imagePath(tmpDir, accepted('a')))).toBe(false);
  });

  it('reports network errors as failed fetches', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    const stats = await pipeline({ fetchImpl }).downloadBatch([accepted('a'), accepted('b')]);

    expect(stats.failedFetch).toBe(2);
    expect(stats.outcomes.map((o) => o.error)).toEqual(['fetch failed', 'fetch failed']);
  });

  it('drops images the classifier marks unsafe', async () => {
    const classifier = staticClassifier(async () => ({ unsafe: true, score: 0.92 }));
    const stats = await pipeline({ classifier }).downloadBatch([accepted('a')]);

    expect(stats.filteredUnsafe).toBe(1);
    expect(fs.existsSync(imagePath(tmpDir, accepted('a')))).toBe(false);
  });

  it('keeps images when the classifier fails', async () => {
    const classifier = staticClassifier(async () => {
      throw new ClassifierError('Classifier returned 503');
    });
    const stats = await pipeline({ classifier }).downloadBatch([accepted('a')]);

    expect(stats.saved).toBe(1);
    expect(fs.existsSync(imagePath(tmpDir, accepted('a')))).toBe(true);
  });

  it('passes the fetched bytes to the classifier', async () => {
    const scoreImage = vi.fn(async (_bytes: ArrayBuffer) => ({ unsafe: false, score: 0.1 }));
    await pipeline({ classifier: { name: 'spy', scoreImage } }).downloadBatch([accepted('a')]);

    const bytes = scoreImage.mock.calls[0]?.[0];
    expect(bytes ? new TextDecoder().decode(bytes) : '').toBe('jpeg-bytes');
  });

  it('shares the download limit across pipelines', async () => {
    let inFlight = 0;
    let peak = 0;
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return new Response('jpeg-bytes');
    });
    const downloadLimit = createLimit(2);

    const [first, second] = await Promise.all([
      pipeline({ fetchImpl, downloadLimit }).downloadBatch(['a', 'b', 'c'].map(accepted)),
      pipeline({ fetchImpl, downloadLimit }).downloadBatch(['d', 'e', 'f'].map(accepted)),
    ]);

    expect(peak).toBe(2);
    expect(first.saved).toBe(3);
    expect(second.saved).toBe(3);
  });
});

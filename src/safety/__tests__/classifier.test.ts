import { describe, it, expect, vi } from 'vitest';
import {
  createImageClassifier,
  DetectionEndpointClassifier,
  ScoreEndpointClassifier,
} from '../classifier.js';
import { ConfigSchema, type Config } from '../../shared/config.js';
import { ClassifierError, ConfigError } from '../../shared/errors.js';

const IMAGE = new ArrayBuffer(8);

function filterConfig(overrides: Partial<Config['image_filter']> = {}): Config['image_filter'] {
  return { ...ConfigSchema.parse({}).image_filter, enabled: true, endpoint: 'http://classifier.local/score', ...overrides };
}

function jsonFetch(body: unknown, status = 200) {
  return vi.fn(async (_url: string, _init?: RequestInit) =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } }),
  );
}

describe('createImageClassifier', () => {
  it('returns null when disabled', () => {
    expect(createImageClassifier(filterConfig({ enabled: false }))).toBeNull();
  });

  it('requires an endpoint when enabled', () => {
    expect(() => createImageClassifier(filterConfig({ endpoint: '' }))).toThrow(ConfigError);
  });

  it('builds the configured backend', () => {
    expect(createImageClassifier(filterConfig())).toBeInstanceOf(ScoreEndpointClassifier);
    const detections = createImageClassifier(filterConfig({ backend: 'detections' }));
    expect(detections).toBeInstanceOf(DetectionEndpointClassifier);
    expect(detections?.name).toBe('detections-endpoint');
  });
});

describe('ScoreEndpointClassifier', () => {
  it('posts the image bytes to the endpoint', async () => {
    const fetchImpl = jsonFetch({ score: 0.2 });
    await createImageClassifier(filterConfig(), fetchImpl)?.scoreImage(IMAGE);

    expect(fetchImpl).toHaveBeenCalledWith(
      'http://classifier.local/score',
      expect.objectContaining({
        method: 'POST',
        headers: { 'Content-Type': 'application/octet-stream' },
        body: IMAGE,
      }),
    );
  });

  it('flags scores above the threshold', async () => {
    const classifier = createImageClassifier(filterConfig({ threshold: 0.7 }), jsonFetch({ score: 0.8 }));
    await expect(classifier?.scoreImage(IMAGE)).resolves.toEqual({ unsafe: true, score: 0.8 });
  });

  it('passes scores at or below the threshold', async () => {
    const classifier = createImageClassifier(filterConfig({ threshold: 0.7 }), jsonFetch({ score: 0.7 }));
    await expect(classifier?.scoreImage(IMAGE)).resolves.toEqual({ unsafe: false, score: 0.7 });
  });

  it('honours an explicit unsafe flag', async () => {
    const classifier = createImageClassifier(filterConfig(), jsonFetch({ score: 0.1, unsafe: true }));
    await expect(classifier?.scoreImage(IMAGE)).resolves.toEqual({ unsafe: true, score: 0.1 });
  });

  it('treats empty input as safe without a request', async () => {
    const fetchImpl = jsonFetch({ score: 1 });
    const classifier = createImageClassifier(filterConfig(), fetchImpl);
    await expect(classifier?.scoreImage(new ArrayBuffer(0))).resolves.toEqual({ unsafe: false, score: 0 });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('throws ClassifierError on HTTP errors', async () => {
    const classifier = createImageClassifier(filterConfig(), jsonFetch({ error: 'overloaded' }, 503));
    await expect(classifier?.scoreImage(IMAGE)).rejects.toThrow('Classifier returned 503');
  });

  it('throws ClassifierError on a non-JSON body', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => new Response('<html>oops</html>'));
    const classifier = createImageClassifier(filterConfig(), fetchImpl);
    await expect(classifier?.scoreImage(IMAGE)).rejects.toThrow('Classifier response is not valid JSON');
  });

  it('throws ClassifierError on an unexpected shape', async () => {
    const classifier = createImageClassifier(filterConfig(), jsonFetch({ probability: 0.3 }));
    await expect(classifier?.scoreImage(IMAGE)).rejects.toBeInstanceOf(ClassifierError);
  });

  it('wraps network failures', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    const classifier = createImageClassifier(filterConfig(), fetchImpl);
    await expect(classifier?.scoreImage(IMAGE)).rejects.toThrow('Classifier request failed: fetch failed');
  });
});

describe('DetectionEndpointClassifier', () => {
  const config = filterConfig({ backend: 'detections', threshold: 0.7 });

  it('uses the best unsafe-label score', async () => {
    const classifier = createImageClassifier(
      config,
      jsonFetch([
        { class: 'FACE_FEMALE', score: 0.99 },
        { class: 'BELLY_EXPOSED', score: 0.75 },
        { class: 'ARMPITS_EXPOSED', score: 0.4 },
      ]),
    );
    await expect(classifier?.scoreImage(IMAGE)).resolves.toEqual({ unsafe: true, score: 0.75 });
  });

  it('accepts a detections object with label keys', async () => {
    const classifier = createImageClassifier(
      config,
      jsonFetch({ detections: [{ label: 'FEMALE_GENITALIA_COVERED', score: 0.6 }] }),
    );
    await expect(classifier?.scoreImage(IMAGE)).resolves.toEqual({ unsafe: false, score: 0.6 });
  });

  it('is safe when no unsafe label is present', async () => {
    const classifier = createImageClassifier(config, jsonFetch({ detections: [{ class: 'FEET_EXPOSED', score: 0.95 }] }));
    await expect(classifier?.scoreImage(IMAGE)).resolves.toEqual({ unsafe: false, score: 0 });
  });
});

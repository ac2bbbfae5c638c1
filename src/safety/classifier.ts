import { z } from 'zod';
import type { Config } from '../shared/config.js';
import { ClassifierError, ConfigError, errorMessage } from '../shared/errors.js';
import { fetchWithTimeout, type FetchLike } from '../shared/http.js';
import { logger } from '../shared/logger.js';

export interface ImageVerdict {
  unsafe: boolean;
  score: number;
}

/**
 * Image safety capability. Backends are interchangeable and chosen once at construction.
 */
export interface ImageClassifier {
  readonly name: string;
  scoreImage(bytes: ArrayBuffer, signal?: AbortSignal): Promise<ImageVerdict>;
}

/**
 * Detection labels counted as unsafe by the detections backend.
 * Covered genitalia is included on purpose.
 */
export const UNSAFE_DETECTION_LABELS: readonly string[] = [
  'FEMALE_GENITALIA_COVERED',
  'BUTTOCKS_EXPOSED',
  'FEMALE_BREAST_EXPOSED',
  'FEMALE_GENITALIA_EXPOSED',
  'MALE_BREAST_EXPOSED',
  'ANUS_EXPOSED',
  'BELLY_EXPOSED',
  'MALE_GENITALIA_EXPOSED',
  'ARMPITS_EXPOSED',
];

const ScoreResponseSchema = z.object({
  score: z.number(),
  unsafe: z.boolean().optional(),
});

const DetectionSchema = z
  .object({
    class: z.string().optional(),
    label: z.string().optional(),
    score: z.number().default(0),
  })
  .transform((d) => ({ label: d.class ?? d.label ?? '', score: d.score }));

const DetectionsResponseSchema = z.union([
  z.object({ detections: z.array(DetectionSchema) }),
  z.array(DetectionSchema).transform((detections) => ({ detections })),
]);

interface HttpBackendOptions {
  endpoint: string;
  threshold: number;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

abstract class HttpImageClassifier implements ImageClassifier {
  abstract readonly name: string;
  protected readonly threshold: number;

  constructor(protected readonly options: HttpBackendOptions) {
    this.threshold = options.threshold;
  }

  async scoreImage(bytes: ArrayBuffer, signal?: AbortSignal): Promise<ImageVerdict> {
    if (bytes.byteLength === 0) {
      return { unsafe: false, score: 0 };
    }

    let response: Response;
    try {
      response = await fetchWithTimeout(
        this.options.endpoint,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/octet-stream' },
          body: bytes,
        },
        this.options.timeoutMs,
        signal,
        this.options.fetchImpl,
      );
    } catch (err) {
      throw new ClassifierError(`Classifier request failed: ${errorMessage(err)}`, {
        backend: this.name,
      });
    }

    if (!response.ok) {
      throw new ClassifierError(`Classifier returned ${response.status}`, {
        backend: this.name,
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new ClassifierError('Classifier response is not valid JSON', { backend: this.name });
    }

    return this.interpret(body);
  }

  protected abstract interpret(body: unknown): ImageVerdict;
}

/**
 * Endpoint answers `{ score, unsafe? }` for the whole image.
 */
export class ScoreEndpointClassifier extends HttpImageClassifier {
  readonly name = 'score-endpoint';

  protected interpret(body: unknown): ImageVerdict {
    const parsed = ScoreResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ClassifierError('Unexpected score response shape', { backend: this.name });
    }
    const { score, unsafe } = parsed.data;
    return { unsafe: unsafe === true || score > this.threshold, score };
  }
}

/**
 * Endpoint answers with labelled region detections (`{ detections: [{ class, score }] }`). The image
 * is unsafe when the best unsafe-label score exceeds the threshold.
 */
export class DetectionEndpointClassifier extends HttpImageClassifier {
  readonly name = 'detections-endpoint';

  protected interpret(body: unknown): ImageVerdict {
    const parsed = DetectionsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ClassifierError('Unexpected detections response shape', { backend: this.name });
    }

    let maxScore = 0;
    let detected = false;
    for (const d of parsed.data.detections) {
      if (UNSAFE_DETECTION_LABELS.includes(d.label)) {
        detected = true;
        maxScore = Math.max(maxScore, d.score);
      }
    }
    return { unsafe: detected && maxScore > this.threshold, score: maxScore };
  }
}

/**
 * Returns null when image filtering is disabled. Throws ConfigError when it
 * is enabled without an endpoint.
 */
export function createImageClassifier(
  config: Config['image_filter'],
  fetchImpl?: FetchLike,
): ImageClassifier | null {
  if (!config.enabled) return null;

  if (!config.endpoint) {
    throw new ConfigError('Image filter enabled but no endpoint configured (NSFW_ENDPOINT)');
  }

  const options: HttpBackendOptions = {
    endpoint: config.endpoint,
    threshold: config.threshold,
    timeoutMs: config.timeout_ms,
    fetchImpl,
  };
  const classifier =
    config.backend === 'detections'
      ? new DetectionEndpointClassifier(options)
      : new ScoreEndpointClassifier(options);

  logger.info({ backend: classifier.name, threshold: config.threshold }, 'Image filtering enabled');
  return classifier;
}

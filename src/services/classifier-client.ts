import { z } from 'zod';
import { ClassifierUnavailableError } from '../errors.js';

/** Raw output of the statistical classifier. */
export interface Classification {
  label: string;
  confidence: number;
}

/** Anything that can score email text. */
export interface ClassifierService {
  classify(text: string): Promise<Classification>;
}

export interface ClassifierClientConfig {
  /** Base URL of the scoring service. */
  apiUrl: string;
  /** Per-request timeout. */
  timeoutMs: number;
}

const ClassificationSchema = z.object({
  label: z.string().min(1),
  confidence: z.number().min(0).max(1),
});

/**
 * HTTP client for the classifier scoring service.
 *
 *   POST {apiUrl}/classify  {"text": "..."}  ->  {"label": "...", "confidence": 0.93}
 *
 * Transport errors, timeouts, non-2xx responses and malformed bodies all
 * surface as {@link ClassifierUnavailableError}.
 */
export class ClassifierClient implements ClassifierService {
  private endpoint: string;

  constructor(private config: ClassifierClientConfig) {
    this.endpoint = `${config.apiUrl.replace(/\/+$/, '')}/classify`;
  }

  async classify(text: string): Promise<Classification> {
    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'Accept': 'application/json' },
        body: JSON.stringify({ text }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw new ClassifierUnavailableError(`Classifier request failed: ${describe(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new ClassifierUnavailableError(`Classifier returned HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ClassifierUnavailableError('Classifier returned invalid JSON', { cause: error });
    }

    const parsed = ClassificationSchema.safeParse(body);
    if (!parsed.success) {
      throw new ClassifierUnavailableError('Classifier response missing label or confidence');
    }
    return parsed.data;
  }
}

function describe(error: unknown): string {
  if (error instanceof Error && error.name === 'TimeoutError') return 'timed out';
  return error instanceof Error ? error.message : String(error);
}

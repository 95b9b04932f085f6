import type { ZodType, ZodTypeDef } from 'zod';
import { getRehabConfig } from '../lib/config/rehab.js';
import { fallbackPrediction } from '../engine/prediction/index.js';
import type { PredictionOutcome, PredictionRequest } from '../engine/prediction/index.js';
import {
  NotesAnalysisResponseSchema,
  PredictionResponseSchema,
} from '../schemas/predictor.schema.js';
import type { NoteSentiment } from '../types/rehab.js';

export const NOTES_ANALYSIS_UNAVAILABLE = 'Analysis unavailable';

export interface NotesAnalysis {
  summary: string;
  sentiment: NoteSentiment | null;
  keyPoints: string[];
  degraded: boolean;
}

/** The external scoring service, as the engine sees it. */
export interface ProgramPredictor {
  /** Never rejects: failures come back as the degraded variant. */
  predict(request: PredictionRequest): Promise<PredictionOutcome>;
  /** Never rejects: failures come back as an "unavailable" analysis. */
  analyzeNotes(inmateId: string, text: string): Promise<NotesAnalysis>;
}

interface PredictorClientOptions {
  baseUrl: string;
  timeoutMs: number;
}

class PredictorRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PredictorRequestError';
  }
}

function describeFailure(error: unknown, timeoutMs: number): string {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return `timed out after ${timeoutMs}ms`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * HTTP client for the external predictor. Every call is bounded by the
 * configured timeout and validated against the declared response schema.
 */
export class HttpPredictorClient implements ProgramPredictor {
  constructor(private readonly options: PredictorClientOptions) {}

  private async post<T>(
    path: string,
    body: unknown,
    schema: ZodType<T, ZodTypeDef, unknown>
  ): Promise<T> {
    const response = await fetch(`${this.options.baseUrl}${path}`, {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      throw new PredictorRequestError(`HTTP ${response.status}`);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new PredictorRequestError('malformed response: body is not JSON');
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
      throw new PredictorRequestError(`malformed response${where}: ${first?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  async predict(request: PredictionRequest): Promise<PredictionOutcome> {
    try {
      console.info(`[predictor] Requesting prediction for inmate ${request.inmateId}`);
      const prediction = await this.post('/recommend', request, PredictionResponseSchema);
      return { kind: 'predicted', prediction };
    } catch (error) {
      const reason = describeFailure(error, this.options.timeoutMs);
      console.warn(
        `[predictor] Prediction unavailable for inmate ${request.inmateId} (${reason}); using rule-based fallback`
      );
      return {
        kind: 'degraded',
        reason,
        prediction: fallbackPrediction(request.suitabilityGroup),
      };
    }
  }

  async analyzeNotes(inmateId: string, text: string): Promise<NotesAnalysis> {
    try {
      const analysis = await this.post(
        '/analyze/notes',
        { inmateId, text },
        NotesAnalysisResponseSchema
      );
      return { ...analysis, degraded: false };
    } catch (error) {
      console.warn(
        `[predictor] Notes analysis unavailable for inmate ${inmateId} (${describeFailure(error, this.options.timeoutMs)})`
      );
      return { summary: NOTES_ANALYSIS_UNAVAILABLE, sentiment: null, keyPoints: [], degraded: true };
    }
  }
}

let predictor: ProgramPredictor | null = null;

export function getPredictorClient(): ProgramPredictor {
  if (!predictor) {
    const config = getRehabConfig();
    predictor = new HttpPredictorClient({
      baseUrl: config.predictor.baseUrl,
      timeoutMs: config.predictor.timeoutMs,
    });
  }
  return predictor;
}

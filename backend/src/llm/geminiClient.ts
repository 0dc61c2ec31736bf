import axios from 'axios';
import { LINK_TIMEOUT_MS, type GenerationProviderInterface } from '../interfaces/GenerationProviderInterface.js';
import type { GenerationRequest, GenerationResult } from './types.js';
import { ProviderError, ProviderTimeoutError, type ErrorDetail } from './errors.js';
import { compileValidator } from '../utils/jsonValidation.js';
import { createLogger, NAMESPACES } from '../logging.js';

const geminiLog = createLogger(NAMESPACES.llm.gemini);

export const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

const GROUNDING_REDIRECT_PREFIX = 'https://vertexaisearch.cloud.google.com/grounding-api-redirect/';

const HARM_CATEGORIES = [
  'HARM_CATEGORY_HATE_SPEECH',
  'HARM_CATEGORY_DANGEROUS_CONTENT',
  'HARM_CATEGORY_HARASSMENT',
  'HARM_CATEGORY_SEXUALLY_EXPLICIT'
] as const;

export const SAFETY_SETTINGS = HARM_CATEGORIES.map((category) => ({ category, threshold: 'BLOCK_NONE' }));

interface GeminiPart {
  text?: string;
  thought?: boolean;
}

interface GeminiCandidate {
  content?: { parts?: GeminiPart[] };
  finishReason?: string;
  groundingMetadata?: {
    webSearchQueries?: string[];
    groundingChunks?: Array<{ web?: { uri?: string } }>;
  };
}

interface GeminiResponse {
  candidates?: GeminiCandidate[];
  promptFeedback?: {
    blockReason?: string;
    blockReasonMessage?: string;
  };
  usageMetadata?: {
    promptTokenCount?: number;
    candidatesTokenCount?: number;
    thoughtsTokenCount?: number;
    totalTokenCount?: number;
  };
}

interface GeminiErrorBody {
  error: { code: number; status: string; message: string; details: ErrorDetail[] };
}

/** The parts of an axios error this client looks at. */
interface HttpFailure {
  code?: string;
  response?: { status: number; statusText?: string; data: unknown };
}

const str = { type: 'string' };
const num = { type: 'number' };
const object = (properties: Record<string, object>, required: string[] = []) => ({ type: 'object', properties, required });
const array = (items: object) => ({ type: 'array', items });

const validateResponse = compileValidator<GeminiResponse>(
  object({
    candidates: array(
      object({
        content: object({ parts: array(object({ text: str, thought: { type: 'boolean' } })) }),
        finishReason: str,
        groundingMetadata: object({
          webSearchQueries: array(str),
          groundingChunks: array(object({ web: object({ uri: str }) }))
        })
      })
    ),
    promptFeedback: object({ blockReason: str, blockReasonMessage: str }),
    usageMetadata: object({
      promptTokenCount: num,
      candidatesTokenCount: num,
      thoughtsTokenCount: num,
      totalTokenCount: num
    })
  })
);

const validateErrorBody = compileValidator<GeminiErrorBody>(
  object(
    {
      error: object(
        {
          code: num,
          status: { type: 'string', default: 'UNKNOWN' },
          message: { type: 'string', default: 'Unknown error' },
          details: { type: 'array', items: { type: 'object' }, default: [] }
        },
        ['code']
      )
    },
    ['error']
  )
);

const validateHttpFailure = compileValidator<HttpFailure>(
  object({
    code: str,
    response: object({ status: num, statusText: str }, ['status'])
  })
);

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export interface GeminiClientOptions {
  baseURL?: string;
  timeoutMs: number;
}

/**
 * Gemini `generateContent` over plain HTTP. The API key travels per request,
 * since callers rotate between several keys.
 */
export class GeminiClient implements GenerationProviderInterface {
  private readonly baseURL: string;
  private readonly timeoutMs: number;

  constructor(options: GeminiClientOptions) {
    this.baseURL = (options.baseURL ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
  }

  buildBody(request: GenerationRequest): Record<string, unknown> {
    const { settings } = request;
    const generationConfig: Record<string, number> = { temperature: settings.temperature };
    if (settings.topK !== undefined) generationConfig.topK = settings.topK;
    if (settings.topP !== undefined) generationConfig.topP = settings.topP;
    if (settings.maxOutputTokens !== undefined) generationConfig.maxOutputTokens = settings.maxOutputTokens;
    if (settings.frequencyPenalty !== undefined) generationConfig.frequencyPenalty = settings.frequencyPenalty;
    if (settings.presencePenalty !== undefined) generationConfig.presencePenalty = settings.presencePenalty;

    return {
      contents: request.turns.map((turn) => ({ role: turn.role, parts: [{ text: turn.text }] })),
      generationConfig,
      safetySettings: SAFETY_SETTINGS,
      ...(settings.search && { tools: [{ googleSearch: {} }] })
    };
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const url = `${this.baseURL}/models/${encodeURIComponent(request.model)}:generateContent`;
    geminiLog(`[GEMINI] Posting ${request.turns.length} turns to ${request.model}`);

    let data: unknown;
    try {
      const response = await axios.post(url, this.buildBody(request), {
        timeout: this.timeoutMs,
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': request.apiKey
        }
      });
      data = response.data;
    } catch (error) {
      throw this.translateError(error);
    }

    const parsed = validateResponse(data);
    if (!parsed.valid) {
      throw new Error(`Unexpected generateContent response: ${parsed.errors[0] ?? 'invalid'}`);
    }
    return toResult(parsed.data);
  }

  async resolveLink(link: string): Promise<string> {
    if (!link.startsWith(GROUNDING_REDIRECT_PREFIX)) return link;
    try {
      const response = await axios.get(link, {
        timeout: LINK_TIMEOUT_MS,
        maxRedirects: 0,
        validateStatus: (status) => status === 302 || (status >= 200 && status < 300)
      });
      const location: unknown = response.headers['location'];
      if (typeof location === 'string') {
        geminiLog('[GEMINI] Link resolved');
        return location;
      }
    } catch (error) {
      geminiLog(`[GEMINI] Could not resolve link: ${error instanceof Error ? error.message : String(error)}`);
    }
    geminiLog('[GEMINI] Link not resolved');
    return link;
  }

  private translateError(error: unknown): Error {
    const failure = validateHttpFailure(error);
    if (failure.valid) {
      const { code, response } = failure.data;
      if (code !== undefined && TIMEOUT_CODES.has(code)) {
        return new ProviderTimeoutError(this.timeoutMs);
      }
      if (response) {
        const body = validateErrorBody(response.data);
        if (body.valid) {
          const { code: status, status: name, message, details } = body.data.error;
          return new ProviderError(status, name, message, details);
        }
        return new ProviderError(response.status, 'UNKNOWN', response.statusText || 'Unknown error');
      }
    }
    return error instanceof Error ? error : new Error(String(error));
  }
}

function toResult(data: GeminiResponse): GenerationResult {
  const candidates = data.candidates ?? [];
  const [candidate] = candidates;
  const result: GenerationResult = {
    parts: (candidate?.content?.parts ?? []).flatMap((part) =>
      part.text !== undefined ? [{ text: part.text, thought: part.thought ?? false }] : []
    ),
    candidateCount: candidates.length,
    blockReason: data.promptFeedback?.blockReason,
    blockReasonMessage: data.promptFeedback?.blockReasonMessage,
    finishReason: candidate?.finishReason
  };

  if (data.usageMetadata) {
    result.usage = {
      promptTokens: data.usageMetadata.promptTokenCount,
      candidatesTokens: data.usageMetadata.candidatesTokenCount,
      thoughtsTokens: data.usageMetadata.thoughtsTokenCount,
      totalTokens: data.usageMetadata.totalTokenCount
    };
  }

  const grounding = candidate?.groundingMetadata;
  if (grounding) {
    result.grounding = {
      searchQueries: grounding.webSearchQueries,
      links: grounding.groundingChunks?.flatMap((chunk) => (chunk.web?.uri ? [chunk.web.uri] : []))
    };
  }

  return result;
}

export default GeminiClient;

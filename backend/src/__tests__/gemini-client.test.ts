import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GeminiClient, SAFETY_SETTINGS } from '../llm/geminiClient.js';
import { ProviderError, ProviderTimeoutError } from '../llm/errors.js';
import type { GenerationRequest } from '../llm/types.js';
import { LINK_TIMEOUT_MS } from '../interfaces/GenerationProviderInterface.js';

const { post, get } = vi.hoisted(() => ({ post: vi.fn(), get: vi.fn() }));
vi.mock('axios', () => ({ default: { post, get } }));

const request: GenerationRequest = {
  apiKey: 'test-key',
  model: 'gemini-test',
  turns: [
    { role: 'model', text: 'You are a narrator.' },
    { role: 'user', text: 'Hello' }
  ],
  settings: { temperature: 1, topK: 50, topP: 0.95 }
};

const httpError = (status: number, statusText: string, data: unknown) =>
  Object.assign(new Error(`Request failed with status code ${status}`), { response: { status, statusText, data } });

describe('GeminiClient', () => {
  const client = new GeminiClient({ baseURL: 'https://gemini.test/v1beta/', timeoutMs: 1_000 });

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('builds the generateContent body', () => {
    expect(client.buildBody({ ...request, settings: { ...request.settings, maxOutputTokens: 300, search: true } })).toEqual({
      contents: [
        { role: 'model', parts: [{ text: 'You are a narrator.' }] },
        { role: 'user', parts: [{ text: 'Hello' }] }
      ],
      generationConfig: { temperature: 1, topK: 50, topP: 0.95, maxOutputTokens: 300 },
      safetySettings: SAFETY_SETTINGS,
      tools: [{ googleSearch: {} }]
    });
  });

  it('leaves out the search tool unless asked for', () => {
    expect(client.buildBody(request)).not.toHaveProperty('tools');
  });

  it('posts with the caller key and reads text, usage and grounding', async () => {
    post.mockResolvedValueOnce({
      data: {
        candidates: [
          {
            content: { parts: [{ text: 'pondering', thought: true }, { text: 'Hi ' }, {}, { text: 'there' }] },
            finishReason: 'STOP',
            groundingMetadata: {
              webSearchQueries: ['weather'],
              groundingChunks: [{ web: { uri: 'https://example.com/a' } }, {}]
            }
          }
        ],
        usageMetadata: { promptTokenCount: 12, candidatesTokenCount: 3, totalTokenCount: 15 }
      }
    });

    const result = await client.generate(request);

    const [url, , config] = post.mock.calls[0];
    expect(url).toBe('https://gemini.test/v1beta/models/gemini-test:generateContent');
    expect(config).toEqual({
      timeout: 1_000,
      headers: { 'Content-Type': 'application/json', 'x-goog-api-key': 'test-key' }
    });
    expect(result).toEqual({
      parts: [
        { text: 'pondering', thought: true },
        { text: 'Hi ', thought: false },
        { text: 'there', thought: false }
      ],
      candidateCount: 1,
      blockReason: undefined,
      blockReasonMessage: undefined,
      finishReason: 'STOP',
      usage: { promptTokens: 12, candidatesTokens: 3, thoughtsTokens: undefined, totalTokens: 15 },
      grounding: { searchQueries: ['weather'], links: ['https://example.com/a'] }
    });
  });

  it('reports a blocked prompt without candidates', async () => {
    post.mockResolvedValueOnce({ data: { promptFeedback: { blockReason: 'PROHIBITED_CONTENT' } } });
    const result = await client.generate(request);
    expect(result.parts).toEqual([]);
    expect(result.candidateCount).toBe(0);
    expect(result.blockReason).toBe('PROHIBITED_CONTENT');
    expect(result.grounding).toBeUndefined();
  });

  it('rejects a reply of the wrong shape', async () => {
    post.mockResolvedValueOnce({ data: { candidates: 'nope' } });
    await expect(client.generate(request)).rejects.toThrow(/^Unexpected generateContent response/);
  });

  it('turns a provider error body into a ProviderError', async () => {
    post.mockRejectedValueOnce(
      httpError(400, 'Bad Request', {
        error: {
          code: 400,
          status: 'INVALID_ARGUMENT',
          message: 'API key not valid. Please pass a valid API key.',
          details: [{ '@type': 'type.googleapis.com/google.rpc.ErrorInfo', reason: 'API_KEY_INVALID' }]
        }
      })
    );

    const error = await client.generate(request).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProviderError);
    if (!(error instanceof ProviderError)) return;
    expect(error.code).toBe(400);
    expect(error.status).toBe('INVALID_ARGUMENT');
    expect(error.message).toBe('API key not valid. Please pass a valid API key.');
    expect(error.details).toEqual([{ '@type': 'type.googleapis.com/google.rpc.ErrorInfo', reason: 'API_KEY_INVALID' }]);
    expect(error.toString()).toBe('400 INVALID_ARGUMENT. API key not valid. Please pass a valid API key.');
  });

  it('falls back to the HTTP status when the body is not a provider error', async () => {
    post.mockRejectedValueOnce(httpError(503, 'Service Unavailable', '<html>down</html>'));
    const error = await client.generate(request).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProviderError);
    expect(String(error)).toBe('503 UNKNOWN. Service Unavailable');
  });

  it('turns an aborted request into a timeout', async () => {
    post.mockRejectedValueOnce(
      Object.assign(new Error('timeout of 1000ms exceeded'), { code: 'ECONNABORTED' })
    );
    await expect(client.generate(request)).rejects.toBeInstanceOf(ProviderTimeoutError);
  });

  it('passes other failures through unchanged', async () => {
    const failure = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
    post.mockRejectedValueOnce(failure);
    await expect(client.generate(request)).rejects.toBe(failure);
  });

  describe('resolveLink', () => {
    const redirect = 'https://vertexaisearch.cloud.google.com/grounding-api-redirect/abc123';

    it('returns ordinary links as they are', async () => {
      expect(await client.resolveLink('https://example.com/page')).toBe('https://example.com/page');
      expect(get).not.toHaveBeenCalled();
    });

    it('follows a grounding redirect once on its own short timeout', async () => {
      get.mockResolvedValueOnce({ status: 302, headers: { location: 'https://example.com/source' } });
      expect(await client.resolveLink(redirect)).toBe('https://example.com/source');
      expect(get.mock.calls[0][1]).toMatchObject({ maxRedirects: 0, timeout: LINK_TIMEOUT_MS });
      expect(LINK_TIMEOUT_MS).toBe(5_000);
    });

    it('keeps the redirect link when it cannot be resolved', async () => {
      get.mockRejectedValueOnce(new Error('socket hang up'));
      expect(await client.resolveLink(redirect)).toBe(redirect);
    });
  });
});

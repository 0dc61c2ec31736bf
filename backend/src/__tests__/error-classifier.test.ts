import { describe, it, expect } from 'vitest';
import {
  classifyFailure,
  classifyRejection,
  quotaViolationMessage,
  rejectionFeedback
} from '../llm/errorClassifier.js';
import { ProviderError, ProviderTimeoutError } from '../llm/errors.js';
import type { GenerationResult } from '../llm/types.js';

const context = { model: 'gemini-test' };

const quotaFailure = (quotaId: string) => ({
  '@type': 'type.googleapis.com/google.rpc.QuotaFailure',
  violations: [{ quotaMetric: 'generativelanguage.googleapis.com/generate_content_free_tier_requests', quotaId }]
});

const errorInfo = (reason: string) => ({ '@type': 'type.googleapis.com/google.rpc.ErrorInfo', reason });

describe('classifyFailure', () => {
  it('turns a timeout into a gateway timeout', () => {
    expect(classifyFailure(new ProviderTimeoutError(60_000), context)).toEqual({
      status: 504,
      message: 'Gateway Timeout',
      statsKey: 'g.time_out',
      credentialValid: true
    });
  });

  it('names the model when it does not exist', () => {
    const error = new ProviderError(404, 'NOT_FOUND', 'models/gemini-test is not found for API version v1beta');
    expect(classifyFailure(error, context)).toMatchObject({
      status: 404,
      message: "Invalid/unsupported model 'gemini-test'",
      statsKey: 'g.failed.client.not_found.model'
    });
  });

  it('passes other not-found messages through', () => {
    const error = new ProviderError(404, 'NOT_FOUND', 'Requested entity was not found.');
    expect(classifyFailure(error, context)).toMatchObject({
      status: 404,
      message: 'Requested entity was not found.',
      statsKey: 'g.failed.client.not_found.unknown'
    });
  });

  it('flags a rejected API key', () => {
    const error = new ProviderError(400, 'INVALID_ARGUMENT', 'API key not valid. Please pass a valid API key.');
    expect(classifyFailure(error, context)).toEqual({
      status: 400,
      message: 'API key not valid. Please pass a valid API key.',
      statsKey: 'g.failed.client.invalid.api_key',
      credentialValid: false
    });
  });

  it('keeps the credential valid for other invalid arguments', () => {
    const error = new ProviderError(400, 'INVALID_ARGUMENT', 'Invalid value at temperature');
    expect(classifyFailure(error, context)).toMatchObject({
      status: 400,
      statsKey: 'g.failed.client.invalid',
      credentialValid: true
    });
  });

  it.each([
    ['SERVICE_DISABLED', 'Generative Language API needs to be enabled', 'g.failed.client.denied.disabled'],
    ['CONSUMER_SUSPENDED', 'Customer suspended. You might be banned.', 'g.failed.client.denied.suspended']
  ])('explains a permission denial with reason %s', (reason, message, statsKey) => {
    const error = new ProviderError(403, 'PERMISSION_DENIED', 'Permission denied', [errorInfo(reason)]);
    expect(classifyFailure(error, context)).toMatchObject({ status: 403, message, statsKey });
  });

  it('passes an unexplained permission denial through', () => {
    const error = new ProviderError(403, 'PERMISSION_DENIED', 'Permission denied', [errorInfo('SOMETHING_ELSE')]);
    expect(classifyFailure(error, context)).toMatchObject({
      message: 'Permission denied',
      statsKey: 'g.failed.client.denied.unknown'
    });
  });

  it('names a daily request quota', () => {
    const quotaId = 'GenerateRequestsPerDayPerProjectPerModel-FreeTier';
    const error = new ProviderError(429, 'RESOURCE_EXHAUSTED', 'You exceeded your current quota', [
      { '@type': 'type.googleapis.com/google.rpc.Help', links: [] },
      quotaFailure(quotaId)
    ]);
    expect(classifyFailure(error, context)).toEqual({
      status: 429,
      message: 'Requests per Day quota exceeded.',
      statsKey: `g.failed.client.quota.violation.${quotaId}`,
      credentialValid: true
    });
  });

  it('passes an unknown quota through', () => {
    const error = new ProviderError(429, 'RESOURCE_EXHAUSTED', 'Resource has been exhausted', [
      quotaFailure('SomeOtherQuota')
    ]);
    expect(classifyFailure(error, context)).toMatchObject({
      status: 429,
      message: 'Resource has been exhausted',
      statsKey: 'g.failed.client.quota.unknown'
    });
  });

  it.each([
    ['UNAVAILABLE', 503, 'The model is overloaded. Please try again later.', 'g.failed.server.overloaded'],
    ['DEADLINE_EXCEEDED', 504, 'Google AI timed out. Try again later.', 'g.failed.server.time_out'],
    ['INTERNAL', 500, 'Google AI had an internal error. Try again later.', 'g.failed.server.internal']
  ])('classifies %s as a server failure', (status, code, message, statsKey) => {
    const error = new ProviderError(code, status, 'The model is overloaded. Please try again later.');
    expect(classifyFailure(error, context)).toMatchObject({ status: code, message, statsKey });
  });

  it('passes unknown statuses through by code class', () => {
    expect(classifyFailure(new ProviderError(418, 'TEAPOT', 'No coffee'), context)).toMatchObject({
      status: 418,
      message: 'No coffee',
      statsKey: 'g.failed.client.unknown'
    });
    expect(classifyFailure(new ProviderError(502, 'UNKNOWN', 'Bad Gateway'), context)).toMatchObject({
      statsKey: 'g.failed.server.unknown'
    });
  });

  it('hides unexpected exceptions', () => {
    expect(classifyFailure(new TypeError('boom'), context)).toEqual({
      status: 502,
      message: 'Unhandled exception from Google AI.',
      statsKey: 'g.failed.unknown',
      credentialValid: true
    });
  });
});

describe('quotaViolationMessage', () => {
  it('matches by prefix', () => {
    expect(quotaViolationMessage('GenerateContentInputTokensPerModelPerMinute-FreeTier')).toBe(
      'Input Tokens per Minute quota exceeded.'
    );
    expect(quotaViolationMessage('Unlisted')).toBeUndefined();
  });
});

describe('classifyRejection', () => {
  const empty: GenerationResult = { parts: [], candidateCount: 1 };
  const none = { usedOocTrick: false, usedPrefill: false, usedThink: false };

  it('prefers the block reason message, then the block reason, then the finish reason', () => {
    expect(rejectionFeedback({ ...empty, blockReason: 'OTHER', blockReasonMessage: 'Custom', finishReason: 'STOP' })).toBe(
      'Custom'
    );
    expect(rejectionFeedback({ ...empty, blockReason: 'PROHIBITED_CONTENT', finishReason: 'STOP' })).toBe(
      'PROHIBITED_CONTENT'
    );
    expect(rejectionFeedback({ ...empty, finishReason: 'SAFETY' })).toBe('SAFETY');
    expect(rejectionFeedback(empty)).toBe('UNKNOWN');
  });

  it('suggests the prompt workarounds when none was used', () => {
    expect(classifyRejection({ ...empty, blockReason: 'PROHIBITED_CONTENT' }, none)).toEqual({
      status: 502,
      message:
        'Response blocked/empty due to PROHIBITED_CONTENT.\nTry using: `//ooctrick on`, `//prefill on`, `//think on`',
      statsKey: 'g.rejected.PROHIBITED_CONTENT',
      credentialValid: true,
      feedback: 'PROHIBITED_CONTENT'
    });
  });

  it('does not suggest workarounds that are already in use', () => {
    const result = classifyRejection({ ...empty, finishReason: 'SAFETY' }, { ...none, usedPrefill: true });
    expect(result.message).toBe('Response blocked/empty due to SAFETY.');
  });

  it('points at the token limit when output ran out', () => {
    const result = classifyRejection({ ...empty, finishReason: 'MAX_TOKENS' }, none);
    expect(result.message).toBe(
      'Response blocked/empty due to MAX_TOKENS.\nTry increasing "Max tokens" in your Generation Settings or set it to zero to disable it.'
    );
  });
});

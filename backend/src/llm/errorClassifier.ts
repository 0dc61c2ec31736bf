/**
 * Maps upstream failures to what the caller is told.
 *
 * Known status names get a tailored message; anything else passes the
 * provider's own message through and is logged as anomalous. Every outcome
 * carries the statistics key it is counted under.
 */

import { ProviderError, ProviderTimeoutError, type ErrorDetail } from './errors.js';
import type { GenerationResult } from './types.js';
import { createLogger, NAMESPACES } from '../logging.js';

const classifierLog = createLogger(NAMESPACES.llm.classifier);

export interface Classification {
  status: number;
  message: string;
  statsKey: string;
  /** False when the provider rejected the API key itself. */
  credentialValid: boolean;
  /** Block or finish reason of a rejected response. */
  feedback?: string;
}

export interface ClassifyContext {
  model: string;
}

const ERROR_INFO_TYPE = 'type.googleapis.com/google.rpc.ErrorInfo';
const QUOTA_FAILURE_TYPE = 'type.googleapis.com/google.rpc.QuotaFailure';

const QUOTA_MESSAGES: ReadonlyArray<[prefix: string, message: string]> = [
  ['GenerateContentInputTokensPerModelPerMinute', 'Input Tokens per Minute quota exceeded.'],
  ['GenerateContentPaidTierInputTokensPerModelPerMinute', 'Input Tokens per Minute quota exceeded.'],
  ['GenerateContentInputTokensPerModelPerDay', 'Input Tokens per Day quota exceeded.'],
  ['GenerateRequestsPerMinutePerProjectPerModel', 'Requests per Minute quota exceeded.'],
  ['GenerateRequestsPerDayPerProjectPerModel', 'Requests per Day quota exceeded.']
];

/** Human-readable text for a quota id, undefined for ids not listed. */
export function quotaViolationMessage(quotaId: string): string | undefined {
  return QUOTA_MESSAGES.find(([prefix]) => quotaId.startsWith(prefix))?.[1];
}

const outcome = (status: number, message: string, statsKey: string, credentialValid = true): Classification => ({
  status,
  message,
  statsKey,
  credentialValid
});

function detailsOfType(details: ErrorDetail[], type: string): ErrorDetail[] {
  return details.filter((detail) => detail['@type'] === type);
}

function quotaIds(details: ErrorDetail[]): string[] {
  const ids: string[] = [];
  for (const detail of detailsOfType(details, QUOTA_FAILURE_TYPE)) {
    const { violations } = detail;
    if (!Array.isArray(violations)) continue;
    for (const violation of violations) {
      if (typeof violation === 'object' && violation !== null && 'quotaId' in violation) {
        const { quotaId } = violation;
        if (typeof quotaId === 'string') ids.push(quotaId);
      }
    }
  }
  return ids;
}

function classifyProviderError(error: ProviderError, context: ClassifyContext): Classification {
  const { code, status, message, details } = error;

  switch (status) {
    case 'NOT_FOUND':
      // 404 "models/* is not found for API version v1beta"
      if (message.startsWith('models/')) {
        return outcome(code, `Invalid/unsupported model '${context.model}'`, 'g.failed.client.not_found.model');
      }
      classifierLog(`[CLASSIFIER] Anomalous provider error: ${error.toString()}`);
      return outcome(code, message, 'g.failed.client.not_found.unknown');

    case 'INVALID_ARGUMENT':
      if (message.includes('API key not valid')) {
        return outcome(code, message, 'g.failed.client.invalid.api_key', false);
      }
      return outcome(code, message, 'g.failed.client.invalid');

    case 'PERMISSION_DENIED':
      for (const detail of detailsOfType(details, ERROR_INFO_TYPE)) {
        if (detail.reason === 'SERVICE_DISABLED') {
          return outcome(code, 'Generative Language API needs to be enabled', 'g.failed.client.denied.disabled');
        }
        if (detail.reason === 'CONSUMER_SUSPENDED') {
          return outcome(code, 'Customer suspended. You might be banned.', 'g.failed.client.denied.suspended');
        }
      }
      return outcome(code, message, 'g.failed.client.denied.unknown');

    case 'RESOURCE_EXHAUSTED':
      for (const quotaId of quotaIds(details)) {
        const feedback = quotaViolationMessage(quotaId);
        if (feedback) {
          return outcome(429, feedback, `g.failed.client.quota.violation.${quotaId}`);
        }
      }
      return outcome(code, message, 'g.failed.client.quota.unknown');

    case 'UNAVAILABLE':
      // 503 "The model is overloaded. Please try again later."
      return outcome(code, message, 'g.failed.server.overloaded');

    case 'DEADLINE_EXCEEDED':
      return outcome(code, 'Google AI timed out. Try again later.', 'g.failed.server.time_out');

    case 'INTERNAL':
      // The upstream text is long and of no use to the caller
      return outcome(code, 'Google AI had an internal error. Try again later.', 'g.failed.server.internal');

    default:
      classifierLog(`[CLASSIFIER] Anomalous provider error: ${error.toString()}`);
      return outcome(code, message, code >= 500 ? 'g.failed.server.unknown' : 'g.failed.client.unknown');
  }
}

/** Classifies anything the provider call threw. */
export function classifyFailure(error: unknown, context: ClassifyContext): Classification {
  if (error instanceof ProviderTimeoutError) {
    return outcome(504, 'Gateway Timeout', 'g.time_out');
  }
  if (error instanceof ProviderError) {
    return classifyProviderError(error, context);
  }
  classifierLog(`[CLASSIFIER] Unhandled provider exception: ${error instanceof Error ? error.stack : String(error)}`);
  return outcome(502, 'Unhandled exception from Google AI.', 'g.failed.unknown');
}

export interface RejectionContext {
  /** Whether any of the prompt workarounds were already in use. */
  usedOocTrick: boolean;
  usedPrefill: boolean;
  usedThink: boolean;
}

/** Reason a response came back without text, `UNKNOWN` when the provider gave none. */
export function rejectionFeedback(result: GenerationResult): string {
  return result.blockReasonMessage || result.blockReason || result.finishReason || 'UNKNOWN';
}

/** Classifies a successful call that produced no usable text. */
export function classifyRejection(result: GenerationResult, context: RejectionContext): Classification {
  const feedback = rejectionFeedback(result);
  let message = `Response blocked/empty due to ${feedback}.`;

  if (feedback === 'MAX_TOKENS') {
    message += '\nTry increasing "Max tokens" in your Generation Settings or set it to zero to disable it.';
  } else if (!context.usedOocTrick && !context.usedPrefill && !context.usedThink) {
    message += '\nTry using: `//ooctrick on`, `//prefill on`, `//think on`';
  }

  return { ...outcome(502, message, `g.rejected.${feedback}`), feedback };
}

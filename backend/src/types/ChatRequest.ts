import type { Toggle } from '../services/UserSettings.js';
import { compileValidator, type SchemaObject } from '../utils/jsonValidation.js';

export interface ChatMessage {
  role: string;
  content: string;
}

export interface ChatRequest {
  messages: ChatMessage[];
  model: string;
  temperature: number;
  max_tokens: number;
  top_k: number;
  top_p: number;
  frequency_penalty: number;
  repetition_penalty: number;
  stream: boolean;
}

// Clients send null for settings they leave unset
const number = { type: 'number', default: 0 };
const text = { type: 'string', default: '' };

export const ChatRequestSchema: SchemaObject = {
  type: 'object',
  additionalProperties: false,
  properties: {
    messages: {
      type: 'array',
      default: [],
      items: {
        type: 'object',
        additionalProperties: false,
        properties: { role: text, content: text }
      }
    },
    model: text,
    temperature: number,
    max_tokens: number,
    top_k: number,
    top_p: number,
    frequency_penalty: number,
    repetition_penalty: number,
    stream: { type: 'boolean', default: false }
  }
};

const validateChatRequest = compileValidator<ChatRequest>(ChatRequestSchema);

/** Inbound request plus the flags directives set for this message only. */
export interface ProxyRequest extends ChatRequest {
  /** Set by the `/quiet/` route: no automatic banner. */
  quiet: boolean;
  toggles: Record<Toggle, boolean>;
  preset?: string;
}

export type ParseResult = { success: true; request: ChatRequest } | { success: false; error: string };

export function parseChatRequest(body: unknown): ParseResult {
  // Validation fills in defaults, so it works on a copy of the body
  const result = validateChatRequest(structuredClone(body));
  if (!result.valid) {
    return { success: false, error: result.errors.join('; ') };
  }
  return { success: true, request: result.data };
}

export function createProxyRequest(request: ChatRequest, options: { quiet?: boolean } = {}): ProxyRequest {
  return {
    ...request,
    quiet: options.quiet ?? false,
    toggles: { advsettings: false, nobot: false, ooctrick: false, prefill: false, search: false, think: false }
  };
}

/**
 * A client's connectivity test is a lone user message with a fixed text.
 * Anything else, including a near miss, goes down the chat path.
 */
export function isProxyTest(body: unknown): boolean {
  if (typeof body !== 'object' || body === null || !('messages' in body)) return false;
  const { messages } = body;
  if (!Array.isArray(messages) || messages.length !== 1) return false;
  const [message]: unknown[] = messages;
  return (
    typeof message === 'object' &&
    message !== null &&
    'content' in message &&
    'role' in message &&
    message.content === 'Just say TEST' &&
    message.role === 'user'
  );
}

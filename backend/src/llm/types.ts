/**
 * One turn of the conversation sent upstream. The provider only knows two
 * speakers: the caller (`user`) and the model (`model`).
 */
export interface ChatTurn {
  role: 'user' | 'model';
  text: string;
}

/** Sampling settings forwarded to the provider. Unset fields use its defaults. */
export interface GenerationSettings {
  temperature: number;
  topK?: number;
  topP?: number;
  maxOutputTokens?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  /** Enable the provider's web search tool. */
  search?: boolean;
}

export interface GenerationRequest {
  apiKey: string;
  model: string;
  turns: ChatTurn[];
  settings: GenerationSettings;
}

export interface CandidatePart {
  text: string;
  /** Internal reasoning, never shown to the caller. */
  thought: boolean;
}

export interface UsageCounts {
  promptTokens?: number;
  candidatesTokens?: number;
  thoughtsTokens?: number;
  totalTokens?: number;
}

/** Present only when the provider reported them. */
export interface GroundingInfo {
  searchQueries?: string[];
  links?: string[];
}

export interface GenerationResult {
  parts: CandidatePart[];
  candidateCount: number;
  /** Set when the prompt itself was rejected. */
  blockReason?: string;
  blockReasonMessage?: string;
  finishReason?: string;
  usage?: UsageCounts;
  grounding?: GroundingInfo;
}

/**
 * GenerationProviderInterface - The upstream model API the proxy fronts
 *
 * Implementations raise ProviderError for an error reply and
 * ProviderTimeoutError when the request budget runs out. A reply without
 * usable text is still a result; classifying it is the caller's job.
 */

import type { GenerationRequest, GenerationResult } from '../llm/types.js';

/** Budget for one {@link GenerationProviderInterface.resolveLink} call. */
export const LINK_TIMEOUT_MS = 5_000;

/** Grounding links resolved per reply; any further ones are listed as given. */
export const MAX_RESOLVED_LINKS = 5;

export interface GenerationProviderInterface {
  generate(request: GenerationRequest): Promise<GenerationResult>;

  /** Follows one redirect hop of a grounding link, returning the link unchanged when it cannot. */
  resolveLink(link: string): Promise<string>;
}

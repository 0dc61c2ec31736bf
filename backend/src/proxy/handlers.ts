import { parseMessage } from '../commands/tokenizer.js';
import { dispatchDirectives } from '../commands/dispatcher.js';
import { MAX_RESOLVED_LINKS, type GenerationProviderInterface } from '../interfaces/GenerationProviderInterface.js';
import { classifyFailure, classifyRejection, type Classification } from '../llm/errorClassifier.js';
import type { GenerationResult, GroundingInfo } from '../llm/types.js';
import type { ProxyResources } from '../resources.js';
import type { StatisticsService } from '../services/StatisticsService.js';
import { UserSettings } from '../services/UserSettings.js';
import type { ProxyRequest } from '../types/ChatRequest.js';
import type { ResponseBuilder } from '../utils/responseBuilder.js';
import { extractThinking, prependThinking } from '../utils/thinkTags.js';
import { userLog } from '../logging.js';
import { buildPrompt, lastUserMessage, type PromptOptions } from './promptBuilder.js';

export interface HandlerContext {
  provider: GenerationProviderInterface;
  statistics: StatisticsService;
  resources: ProxyResources;
  bannerVersion: number;
  /** The key picked for this request out of the caller's list. */
  apiKey: string;
  user: UserSettings;
  request: ProxyRequest;
  response: ResponseBuilder;
}

type GenerationOutcome =
  | { ok: true; text: string; extras: string; result: GenerationResult }
  | { ok: false; classification: Classification };

// U+3164 HANGUL FILLER keeps the client from collapsing the list indentation
const listLines = (items: string[]) => items.map((item) => `\u3164- ${item}`).join('\n');

async function groundingExtras(
  provider: GenerationProviderInterface,
  user: UserSettings,
  grounding: GroundingInfo
): Promise<string> {
  let extras = '';

  if (grounding.searchQueries) {
    userLog(user.xuid, `Made ${grounding.searchQueries.length} web searches`);
    extras += `Searches:\n${listLines(grounding.searchQueries)}\n`;
  }

  if (grounding.links) {
    const links: string[] = [];
    for (const [index, link] of grounding.links.entries()) {
      links.push(index < MAX_RESOLVED_LINKS ? await provider.resolveLink(link) : link);
    }
    userLog(user.xuid, `Found ${links.length} links`);
    extras += `Links:\n${listLines(links)}\n`;
  }

  return extras;
}

async function generateContent(
  context: HandlerContext,
  user: UserSettings,
  options: PromptOptions = {}
): Promise<GenerationOutcome> {
  const { provider, statistics, request, resources } = context;
  const prompt = buildPrompt(request, user, resources, options);

  let result: GenerationResult;
  try {
    result = await provider.generate({
      apiKey: context.apiKey,
      model: request.model,
      turns: prompt.turns,
      settings: prompt.settings
    });
  } catch (error) {
    const classification = classifyFailure(error, { model: request.model });
    if (!classification.credentialValid) {
      user.valid = false;
    }
    await statistics.track(classification.statsKey);
    return { ok: false, classification };
  }

  if (result.candidateCount > 1) {
    userLog(user.xuid, 'Warning: more than one candidate found in response');
  }

  let text = result.parts
    .filter((part) => !part.thought)
    .map((part) => part.text)
    .join('');

  let extras = '';
  if (result.grounding) {
    extras = await groundingExtras(provider, user, result.grounding);
  } else if (prompt.used.search) {
    userLog(user.xuid, 'Web search was not used');
  }

  if (!text) {
    const classification = classifyRejection(result, {
      usedOocTrick: prompt.used.ooctrick,
      usedPrefill: prompt.used.prefill,
      usedThink: prompt.used.think
    });
    if (classification.feedback === 'UNKNOWN') {
      userLog(user.xuid, `No result text: ${JSON.stringify(result)}`);
    }
    await statistics.track(classification.statsKey);
    return { ok: false, classification };
  }

  if (prompt.used.think) {
    const extracted = extractThinking(text);
    text = extracted.text;
    if (extracted.thinking === undefined) {
      userLog(user.xuid, 'No thinking tags found');
    } else if (user.thinkText === 'keep') {
      userLog(user.xuid, 'Thinking text kept');
      text = prependThinking(text, extracted.thinking);
    }
  }

  userLog(user.xuid, `Result text is ${text.length} characters, ${text.split(/\s+/).filter(Boolean).length} words`);
  await statistics.track('g.succeeded');
  return { ok: true, text, extras, result };
}

/**
 * Checks the caller's key and model. Runs with blank settings so nothing the
 * caller enabled can change the outcome, and without the tiny output limit
 * such tests send.
 */
export async function handleProxyTest(context: HandlerContext): Promise<ResponseBuilder> {
  const { user, request, response } = context;
  userLog(user.xuid, `Handling proxy test (${request.model}) ...`);

  const blank = UserSettings.blank(user.xuid);
  const outcome = await generateContent(context, blank, { unboundedOutput: true });
  user.valid = blank.valid;

  if (!outcome.ok) {
    return response.addError(outcome.classification.message, outcome.classification.status);
  }
  return response.addMessage(outcome.text);
}

export async function handleChatMessage(context: HandlerContext): Promise<ResponseBuilder> {
  const { user, request, response, resources, bannerVersion } = context;

  const last = lastUserMessage(request.messages);
  if (request.messages[request.messages.length - 1]?.role === 'assistant') {
    userLog(user.xuid, 'User set prefill detected');
  }
  userLog(user.xuid, `Handling chat message (${request.model}) ...`);

  if (last) {
    const { directives } = parseMessage(last.content);
    const { halted } = dispatchDirectives(directives, { user, request, response, resources, bannerVersion });
    if (halted) return response;
  }

  const outcome = await generateContent(context, user);
  if (!outcome.ok) {
    return response.addError(outcome.classification.message, outcome.classification.status);
  }

  response.addMessage(outcome.text);
  if (outcome.extras) {
    response.addProxyMessage(outcome.extras);
  }

  const usage = outcome.result.usage;
  if (usage) {
    userLog(user.xuid, ` - Prompt   tokens ${usage.promptTokens ?? 'n/a'}`);
    userLog(user.xuid, ` - Response tokens ${usage.candidatesTokens ?? 'n/a'}`);
    userLog(user.xuid, ` - Thinking tokens ${usage.thoughtsTokens ?? 'n/a'}`);
    userLog(user.xuid, ` - Total    tokens ${usage.totalTokens ?? 'n/a'}`);
  } else {
    userLog(user.xuid, ' - No usage metadata');
  }

  if (!request.quiet && user.shouldShowBanner(bannerVersion)) {
    userLog(user.xuid, `Showing${user.exists ? ' ' : ' new '}user the latest banner`);
    response.addMessage(resources.banner);
  }

  return response;
}

/**
 * Orchestrator - One chat completion from credential to reply
 *
 * The caller's lock is taken right after their identity is derived and held
 * until the reply is built, so a caller has at most one request in flight.
 * Contention is answered immediately instead of queued.
 */

import { Xuid } from '../identity/xuid.js';
import type { GenerationProviderInterface } from '../interfaces/GenerationProviderInterface.js';
import type { SettingsStoreInterface } from '../interfaces/SettingsStoreInterface.js';
import type { ProxyResources } from '../resources.js';
import type { StatisticsService } from '../services/StatisticsService.js';
import { UserSettings } from '../services/UserSettings.js';
import { createProxyRequest, isProxyTest, parseChatRequest, type ProxyRequest } from '../types/ChatRequest.js';
import type { CooldownPolicy } from '../utils/cooldown.js';
import { ResponseBuilder, type BuiltResponse } from '../utils/responseBuilder.js';
import { createLogger, NAMESPACES, userLog } from '../logging.js';
import { handleChatMessage, handleProxyTest, type HandlerContext } from './handlers.js';

const orchestratorLog = createLogger(NAMESPACES.proxy.orchestrator);

export const INTERNAL_ERROR_MESSAGE = 'Internal Proxy Error';

/** Anything that can report bandwidth usage in MiB. */
export interface BandwidthSource {
  usage(): Promise<number | undefined>;
}

export interface OrchestratorOptions {
  store: SettingsStoreInterface;
  provider: GenerationProviderInterface;
  statistics: StatisticsService;
  bandwidth: BandwidthSource;
  cooldown: CooldownPolicy;
  resources: ProxyResources;
  xuidSecret: string | Uint8Array;
  bannerVersion: number;
  /** Unix seconds. */
  now?: () => number;
}

export interface ProxyCall {
  path: string;
  /** Raw `Authorization` header. */
  authorization?: string;
  body: unknown;
}

/** `Bearer k1,k2,...` to the list of keys, undefined when malformed. */
export function parseAuthorization(header: string | undefined): string[] | undefined {
  if (!header) return undefined;
  const index = header.indexOf(' ');
  if (index === -1 || header.slice(0, index).toLowerCase() !== 'bearer') return undefined;
  const keys = header
    .slice(index + 1)
    .split(',')
    .map((key) => key.trim())
    .filter(Boolean);
  return keys.length > 0 ? keys : undefined;
}

const isNonEmptyObject = (value: unknown): boolean =>
  typeof value === 'object' && value !== null && !Array.isArray(value) && Object.keys(value).length > 0;

export class Orchestrator {
  private readonly now: () => number;

  constructor(private readonly options: OrchestratorOptions) {
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
  }

  /** Never throws; anything unexpected becomes a plain 500. */
  async handle(call: ProxyCall): Promise<BuiltResponse> {
    try {
      return await this.process(call);
    } catch (error) {
      orchestratorLog(`[ORCHESTRATOR] Unhandled error: ${error instanceof Error ? error.stack : String(error)}`);
      return { status: 500, contentType: 'text/plain; charset=utf-8', body: INTERNAL_ERROR_MESSAGE };
    }
  }

  private async process(call: ProxyCall): Promise<BuiltResponse> {
    const parsed = parseChatRequest(call.body);
    if (!isNonEmptyObject(call.body) || !parsed.success) {
      return { status: 400, contentType: 'text/plain; charset=utf-8', body: 'Bad Request. Missing or invalid JSON.' };
    }

    const request = createProxyRequest(parsed.request, { quiet: call.path.includes('/quiet/') });
    const proxyTest = isProxyTest(call.body);
    const response = new ResponseBuilder({ stream: request.stream, wrapErrors: proxyTest });

    const keys = parseAuthorization(call.authorization);
    if (!keys) {
      return response.buildError('Unauthorized. API key required.', 401);
    }

    const { store, statistics } = this.options;
    const xuid = new Xuid(keys[0], this.options.xuidSecret);

    const lease = await store.lock(xuid);
    if (!lease) {
      userLog(xuid, 'User attempted concurrent use');
      await statistics.track('p.concurrent');
      return response.buildError('Concurrent use is not allowed. Please wait a moment.', 403);
    }

    try {
      return await this.processLocked(call.path, xuid, keys, request, proxyTest, response);
    } finally {
      await store.unlock(lease);
    }
  }

  private async processLocked(
    path: string,
    xuid: Xuid,
    keys: string[],
    request: ProxyRequest,
    proxyTest: boolean,
    response: ResponseBuilder
  ): Promise<BuiltResponse> {
    const { store, statistics, cooldown, bandwidth } = this.options;
    const user = await UserSettings.load(store, xuid, this.now);

    const seconds = user.lastSeen();
    if (seconds !== undefined && !cooldown.disabled) {
      const delay = cooldown.apply(await bandwidth.usage()) - seconds;
      if (delay > 0) {
        userLog(xuid, `User told to wait ${delay} seconds`);
        await statistics.track('p.cooldown');
        return response.buildError(`Please wait ${delay} seconds.`, 429);
      }
    }

    const keyIndex = user.rcounter % keys.length;
    user.incrementRcounter();

    const details = [`User ${user.lastSeenMessage()}`, `Request #${user.rcounter}`];
    if (keys.length > 1) details.push(`Key ${keyIndex + 1}/${keys.length}`);
    userLog(xuid, `Processing ${request.stream ? 'stream ' : ''}${path} (${details.join(', ')})`);
    const started = Date.now();

    const context: HandlerContext = {
      provider: this.options.provider,
      statistics,
      resources: this.options.resources,
      bannerVersion: this.options.bannerVersion,
      apiKey: keys[keyIndex],
      user,
      request,
      response
    };

    try {
      if (!request.model) {
        response.addError('Please specify a model.', 400);
      } else if (proxyTest) {
        await handleProxyTest(context);
      } else {
        await handleChatMessage(context);
      }
    } catch (error) {
      response.addError(INTERNAL_ERROR_MESSAGE, 500);
      orchestratorLog(`[ORCHESTRATOR] Handler failed: ${error instanceof Error ? error.stack : String(error)}`);
    }

    const elapsed = Date.now() - started;
    if (!response.hasErrors) {
      userLog(xuid, `Processing succeeded (${elapsed} ms)`);
      const announcement = proxyTest ? '' : await store.getAnnouncement();
      if (announcement) {
        response.addProxyMessage(`***\n${announcement}\n***`);
      }
    } else {
      const [first, ...rest] = response.message.split('\n');
      userLog(xuid, `Processing failed (${elapsed} ms): ${first}`);
      for (const line of rest) userLog(xuid, `> ${line}`);
    }

    if (user.valid) {
      await user.save();
    } else {
      userLog(xuid, 'Invalid user not saved');
    }

    return response.build();
  }
}

export default Orchestrator;

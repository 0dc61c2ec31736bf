import debug from 'debug';
import { Xuid } from './identity/xuid.js';

export const NAMESPACES = {
  server: {
    main: 'rpproxy:server',
    admin: 'rpproxy:server:admin'
  },
  proxy: {
    orchestrator: 'rpproxy:proxy:orchestrator',
    handlers: 'rpproxy:proxy:handlers',
    commands: 'rpproxy:proxy:commands'
  },
  stores: {
    local: 'rpproxy:stores:local',
    redis: 'rpproxy:stores:redis',
    factory: 'rpproxy:stores:factory'
  },
  services: {
    bandwidth: 'rpproxy:services:bandwidth',
    statistics: 'rpproxy:services:statistics'
  },
  llm: {
    gemini: 'rpproxy:llm:gemini',
    classifier: 'rpproxy:llm:classifier'
  },
  config: 'rpproxy:config',
  user: 'rpproxy:user'
} as const;

export const createLogger = (namespace: string) => debug(namespace);

export const enableNamespaces = (namespaces: string) => debug.enable(namespaces);

const userLogger = createLogger(NAMESPACES.user);

/**
 * Log a line attributed to a caller. Only the short identity form is printed,
 * never the full key or any credential.
 */
export function userLog(xuid: Xuid | null, message: string): void {
  const prefix = xuid ? xuid.pretty() : '='.repeat(Xuid.PRETTY_LENGTH);
  userLogger(`${prefix} ${message.trim()}`);
}

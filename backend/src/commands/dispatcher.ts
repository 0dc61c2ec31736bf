import { userLog } from '../logging.js';
import { executeDirective, type DirectiveContext } from './registry.js';
import type { ParsedDirective } from './tokenizer.js';

export interface DispatchResult {
  /** An informational directive answered the message; nothing else should run. */
  halted: boolean;
}

/**
 * Runs directives in the order they were written. A rejected argument is
 * reported inline and the remaining directives still run.
 */
export function dispatchDirectives(directives: ParsedDirective[], context: DirectiveContext): DispatchResult {
  for (const directive of directives) {
    userLog(context.user.xuid, `//${directive.name} ${directive.args}`);

    const outcome = executeDirective(directive.spec, directive.args, context);
    switch (outcome.kind) {
      case 'ok':
        break;
      case 'recovered': {
        const message = `Error: ${outcome.message} (Command has been ignored.)`;
        context.response.addProxyMessage(message);
        userLog(context.user.xuid, message);
        break;
      }
      case 'earlyExit':
        context.response.addProxyMessage(outcome.message);
        return { halted: true };
    }
  }
  return { halted: false };
}

/**
 * The fixed table of `//name [argument]` directives.
 *
 * Three shapes exist: toggles (`off|on|this`, sticky unless `this`),
 * informational directives without an argument, and parameterized ones whose
 * argument must match a pattern. Execution never throws; a bad argument is a
 * `recovered` outcome reported inline while the rest of the message proceeds.
 */

import type { ProxyRequest } from '../types/ChatRequest.js';
import type { ProxyResources } from '../resources.js';
import type { ResponseBuilder } from '../utils/responseBuilder.js';
import type { Toggle, UserSettings } from '../services/UserSettings.js';

export type DirectiveOutcome =
  | { kind: 'ok' }
  | { kind: 'recovered'; message: string }
  | { kind: 'earlyExit'; message: string };

export interface DirectiveContext {
  user: UserSettings;
  request: ProxyRequest;
  response: ResponseBuilder;
  resources: ProxyResources;
  bannerVersion: number;
}

interface ToggleDirective {
  shape: 'toggle';
  name: string;
  setting: Toggle;
  describe: (enabled: boolean) => string;
}

interface InfoDirective {
  shape: 'info';
  name: string;
  run: (context: DirectiveContext) => DirectiveOutcome;
}

interface ParameterizedDirective {
  shape: 'parameterized';
  name: string;
  /** Shown to the user when the argument is missing or rejected. */
  hint: string;
  pattern: RegExp;
  run: (args: string, context: DirectiveContext) => DirectiveOutcome;
}

export type DirectiveSpec = ToggleDirective | InfoDirective | ParameterizedDirective;

export const TOGGLE_HINT = 'off|on|this';
const TOGGLE_PATTERN = /^(?:off|on|this)$/;

export const OK: DirectiveOutcome = Object.freeze({ kind: 'ok' });

const recovered = (message: string): DirectiveOutcome => ({ kind: 'recovered', message });

/** Number of argument tokens the tokenizer collects for a directive. */
export function argumentCount(spec: DirectiveSpec): number {
  return spec.shape === 'info' ? 0 : 1;
}

const enabled = (value: boolean) => (value ? 'enabled' : 'disabled');

const aboutme: InfoDirective = {
  shape: 'info',
  name: 'aboutme',
  run: ({ user }) => {
    const lines = [
      `Your user ID on this proxy is \`${user.xuid.full}\`.` +
        ` You were ${user.lastSeenMessage()}. Your request counter is ${user.rcounter}.` +
        ' Your settings are:',
      `- //advsettings is ${enabled(user.getToggle('advsettings'))}`,
      `- //nobot is ${enabled(user.getToggle('nobot'))}`,
      `- //ooctrick is ${enabled(user.getToggle('ooctrick'))}`,
      `- //prefill is ${enabled(user.getToggle('prefill'))}`,
      `- //search is ${enabled(user.getToggle('search'))}`,
      `- //think is ${enabled(user.getToggle('think'))}`,
      `- //think_text is ${user.thinkText}`
    ];
    return { kind: 'earlyExit', message: lines.join('\n') };
  }
};

const banner: InfoDirective = {
  shape: 'info',
  name: 'banner',
  run: ({ user, response, resources, bannerVersion }) => {
    user.shouldShowBanner(bannerVersion);
    response.addProxyMessage(resources.banner, '***');
    return OK;
  }
};

const preset: ParameterizedDirective = {
  shape: 'parameterized',
  name: 'preset',
  hint: '[A-Za-z]+',
  pattern: /^[A-Za-z]+$/,
  run: (args, { request, response, resources }) => {
    const text = resources.presets.get(args);
    if (text === undefined) {
      const available = [...resources.presets.keys()].map((key) => `\`${key}\``).join(', ');
      return recovered(`"\`${args}\`" is not a valid preset. Available presets: ${available}`);
    }
    request.preset = text;
    response.addProxyMessage(`Added preset "\`${args}\`" to this message.`);
    return OK;
  }
};

const thinkText: ParameterizedDirective = {
  shape: 'parameterized',
  name: 'think_text',
  hint: 'keep|remove',
  pattern: /^(?:keep|remove)$/,
  run: (args, { user, response }) => {
    user.thinkText = args === 'keep' ? 'keep' : 'remove';
    response.addProxyMessage(`Thinking text will be ${args === 'keep' ? 'kept' : 'removed'}.`);
    return OK;
  }
};

const toggle = (setting: Toggle, describe: (enabled: boolean) => string): ToggleDirective => ({
  shape: 'toggle',
  name: setting,
  setting,
  describe
});

const DIRECTIVE_LIST: readonly DirectiveSpec[] = [
  aboutme,
  banner,
  preset,
  thinkText,
  toggle('advsettings', (on) => `Advanced generation settings ${enabled(on)}`),
  toggle('nobot', (on) => `Bot description ${on ? 'omitted' : 'kept'}`),
  toggle('ooctrick', (on) => `OOC Trick ${enabled(on)}`),
  toggle('prefill', (on) => `Prefill ${enabled(on)}`),
  toggle('search', (on) => `Search ${enabled(on)}`),
  toggle('think', (on) => `Thinking ${enabled(on)}`)
];

export const DIRECTIVES: ReadonlyMap<string, DirectiveSpec> = new Map(
  DIRECTIVE_LIST.map((spec) => [spec.name, spec])
);

function argumentError(name: string, hint: string, args: string): DirectiveOutcome {
  if (!args) {
    return recovered(`\`//${name}\` requires an argument "\`${hint}\`".`);
  }
  return recovered(`\`//${name}\` only accepts "\`${hint}\`", not "\`${args}\`".`);
}

/** Runs one directive against the request, the caller's settings and the reply. */
export function executeDirective(spec: DirectiveSpec, args: string, context: DirectiveContext): DirectiveOutcome {
  switch (spec.shape) {
    case 'info':
      return spec.run(context);

    case 'parameterized':
      if (!spec.pattern.test(args)) return argumentError(spec.name, spec.hint, args);
      return spec.run(args, context);

    case 'toggle': {
      if (!TOGGLE_PATTERN.test(args)) return argumentError(spec.name, TOGGLE_HINT, args);
      const value = args !== 'off';
      context.request.toggles[spec.setting] = value;
      if (args !== 'this') {
        context.user.setToggle(spec.setting, value);
      }
      context.response.addProxyMessage(
        spec.describe(value) + (args === 'this' ? ' (for this message only).' : '.')
      );
      return OK;
    }
  }
}

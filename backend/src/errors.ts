/**
 * Error types shared across the proxy. Upstream provider errors live in
 * llm/errors.ts next to the client that raises them.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class CooldownParseError extends Error {
  constructor(readonly input: string) {
    super(`Invalid cooldown step "${input}", expected duration[:bandwidth]`);
    this.name = 'CooldownParseError';
  }
}

export class UserNotFoundError extends Error {
  constructor(readonly key: string) {
    super(`No stored settings for ${key.slice(0, 8)}`);
    this.name = 'UserNotFoundError';
  }
}


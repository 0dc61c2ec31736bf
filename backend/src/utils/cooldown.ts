import { CooldownParseError } from '../errors.js';

/** Seconds to wait between requests once usage reaches `bandwidth` GiB. */
export interface Cooldown {
  readonly duration: number;
  readonly bandwidth: number;
}

const INTEGER = /^\d+$/;

function parseInteger(text: string, step: string): number {
  if (!INTEGER.test(text)) {
    throw new CooldownParseError(step);
  }
  return Number.parseInt(text, 10);
}

/** `duration[:bandwidth]`, a bare duration means bandwidth 0 and an empty step means no cooldown. */
export function parseCooldown(step: string): Cooldown {
  const index = step.indexOf(':');
  if (index > 0) {
    return {
      duration: parseInteger(step.slice(0, index), step),
      bandwidth: parseInteger(step.slice(index + 1), step)
    };
  }
  if (step) {
    return { duration: parseInteger(step, step), bandwidth: 0 };
  }
  return { duration: 0, bandwidth: 0 };
}

/**
 * Bandwidth-tiered cooldown. Steps are ordered by threshold, highest first,
 * with one step per threshold.
 */
export class CooldownPolicy {
  private constructor(readonly cooldowns: readonly Cooldown[]) {}

  static parse(text: string): CooldownPolicy {
    const parsed = text.replace(/\s/g, '').split(',').map(parseCooldown);
    // Array.prototype.sort is stable, so equal thresholds keep their order
    parsed.sort((a, b) => b.bandwidth - a.bandwidth);

    const cooldowns: Cooldown[] = [];
    for (const cooldown of parsed) {
      const last = cooldowns[cooldowns.length - 1];
      if (last && last.bandwidth === cooldown.bandwidth) {
        if (cooldown.duration > last.duration) {
          cooldowns[cooldowns.length - 1] = cooldown;
        }
      } else {
        cooldowns.push(cooldown);
      }
    }
    return new CooldownPolicy(Object.freeze(cooldowns.map((c) => Object.freeze(c))));
  }

  /**
   * Required wait in seconds for a usage reading in MiB. An unavailable or
   * negative reading never triggers a cooldown.
   */
  apply(usageMiB: number | undefined): number {
    if (usageMiB === undefined || usageMiB < 0) return 0;
    const gib = Math.floor(usageMiB / 1024);
    for (const cooldown of this.cooldowns) {
      if (cooldown.bandwidth <= gib) {
        return cooldown.duration;
      }
    }
    return 0;
  }

  /** True when every step has a zero duration. */
  get disabled(): boolean {
    return this.cooldowns.every((c) => c.duration === 0);
  }

  toString(): string {
    return this.cooldowns.map((c) => `${c.duration}:${c.bandwidth}`).join(',');
  }
}

export default CooldownPolicy;

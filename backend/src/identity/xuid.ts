import { createHmac } from 'crypto';

type Bytes = string | Uint8Array;

const toBuffer = (value: Bytes): Buffer =>
  typeof value === 'string' ? Buffer.from(value, 'utf-8') : Buffer.from(value);

/**
 * Anonymous caller identifier.
 *
 * The proxy never sees anything about a caller except their API key. Keying a
 * hash of that key with a process-wide secret salt gives a stable id that can
 * be stored and locked on without keeping the key itself.
 *
 * Comparing an Xuid with anything other than another Xuid throws. An Xuid
 * mixed into a heterogeneous collection is a program error, not a miss.
 */
export class Xuid {
  /** Length of {@link full}: unpadded base64 of a SHA-256 digest. */
  static readonly FULL_LENGTH = Math.ceil((32 * 4) / 3);
  static readonly SHORT_LENGTH = 8;
  /** Length of {@link pretty}, used to align log lines. */
  static readonly PRETTY_LENGTH = Xuid.SHORT_LENGTH + 2;

  private readonly raw: Buffer;
  /** Full, storage-safe form. */
  readonly full: string;

  constructor(secret: Bytes, salt: Bytes) {
    this.raw = createHmac('sha256', toBuffer(salt)).update(toBuffer(secret)).digest();
    this.full = this.raw.toString('base64url');
  }

  /** Cosmetic prefix for log lines. Higher collision risk, never use as a key. */
  get short(): string {
    return this.full.slice(0, Xuid.SHORT_LENGTH);
  }

  get lockId(): string {
    return `${this.full}:lock`;
  }

  pretty(): string {
    return `<${this.short}>`;
  }

  equals(other: unknown): boolean {
    if (!(other instanceof Xuid)) {
      const kind = other === null ? 'null' : Array.isArray(other) ? 'array' : typeof other;
      throw new TypeError(`Can't compare an Xuid with ${kind}`);
    }
    return this.raw.equals(other.raw);
  }

  toString(): string {
    return this.short;
  }
}

export default Xuid;

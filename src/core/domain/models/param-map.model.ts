import { PaymentChannel } from '../enums';
import {
  buildSigningString,
  renderParamValue,
  SigningRules,
} from '../../signing/canonicalization';
import { getChannelDefinition } from '../../notification/channels';

/**
 * Scalar or nested value a ParamMap can hold
 */
export type ParamValue = string | number | boolean | ParamMap;

/**
 * Plain view of a ParamMap; nested containers become nested objects
 */
export interface ParamRecord {
  [key: string]: string | number | boolean | ParamRecord;
}

/**
 * ParamMap - ordered request/response parameter container
 *
 * Insertion order is preserved and significant for transport serialization.
 * `set()` silently ignores null, undefined and empty-string values so call
 * sites can pass optional fields without guarding each one.
 */
export class ParamMap {
  private readonly data = new Map<string, ParamValue>();

  /**
   * Build a container from a plain record.
   * `keepEmpty` stores empty strings as-is; used for untrusted parsed input.
   */
  static fromRecord(
    record: Record<string, ParamValue | null | undefined>,
    options: { keepEmpty?: boolean } = {},
  ): ParamMap {
    const map = new ParamMap();
    for (const [key, value] of Object.entries(record)) {
      if (options.keepEmpty && value === '') {
        map.data.set(key, value);
      } else {
        map.set(key, value);
      }
    }
    return map;
  }

  /**
   * Store a value. Null/undefined/'' are ignored and do not remove an
   * existing entry; use `remove()` for that.
   */
  set(key: string, value: ParamValue | null | undefined): this {
    if (value === null || value === undefined || value === '') {
      return this;
    }
    this.data.set(key, value);
    return this;
  }

  get(key: string): ParamValue | undefined;
  get<T extends ParamValue>(key: string, defaultValue: T): ParamValue | T;
  get(key: string, defaultValue?: ParamValue): ParamValue | undefined {
    return this.data.has(key) ? this.data.get(key) : defaultValue;
  }

  /**
   * Typed read: returns the default when the stored value is not a string
   */
  getString(key: string, defaultValue = ''): string {
    const value = this.data.get(key);
    return typeof value === 'string' ? value : defaultValue;
  }

  remove(key: string): this {
    this.data.delete(key);
    return this;
  }

  contains(key: string): boolean {
    return this.data.has(key);
  }

  clear(): this {
    this.data.clear();
    return this;
  }

  /**
   * Merge entries from another container or record (filtered like `set`)
   */
  update(other: ParamMap | Record<string, ParamValue | null | undefined>): this {
    const entries: Array<[string, ParamValue | null | undefined]> =
      other instanceof ParamMap ? other.entries() : Object.entries(other);
    for (const [key, value] of entries) {
      this.set(key, value);
    }
    return this;
  }

  /**
   * Shallow copy, empty values included
   */
  clone(): ParamMap {
    const copy = new ParamMap();
    for (const [key, value] of this.data) {
      copy.data.set(key, value);
    }
    return copy;
  }

  get size(): number {
    return this.data.size;
  }

  keys(): string[] {
    return Array.from(this.data.keys());
  }

  entries(): Array<[string, ParamValue]> {
    return Array.from(this.data.entries());
  }

  toMapping(): ParamRecord {
    const mapping: ParamRecord = {};
    for (const [key, value] of this.data) {
      mapping[key] = value instanceof ParamMap ? value.toMapping() : value;
    }
    return mapping;
  }

  toJSON(): ParamRecord {
    return this.toMapping();
  }

  toJsonText(): string {
    return JSON.stringify(this.toMapping());
  }

  /**
   * Transport encoding: `k=v&...` in insertion order, RFC 3986 escaped
   */
  toQueryText(): string {
    return this.entries()
      .map(([key, value]) => `${encodeRfc3986(key)}=${encodeRfc3986(renderParamValue(value))}`)
      .join('&');
  }

  /**
   * Signing string for explicit rules, or for a channel under its default
   * algorithm's profile. A channel configured with another algorithm may use
   * another profile; `ChannelSigningService.buildSigningString` resolves the
   * configured one.
   */
  toSigningText(target: PaymentChannel | SigningRules, secret?: string): string {
    if (typeof target === 'string') {
      const definition = getChannelDefinition(target);
      return buildSigningString(this, definition.defaultProfile, {
        signatureField: definition.signatureField,
        secret,
      });
    }
    return buildSigningString(this, target.profile, {
      signatureField: target.signatureField,
      exclude: target.exclude,
      secret: secret ?? target.secret,
    });
  }

  toString(): string {
    return JSON.stringify(this.toMapping(), null, 2);
  }
}

function encodeRfc3986(text: string): string {
  return encodeURIComponent(text).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

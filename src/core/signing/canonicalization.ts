import { SigningProfile } from '../domain/enums';
import { InvalidKeyMaterialError } from '../domain/errors';

/**
 * How a field set is turned into the exact string handed to a Signer
 */
export interface SigningPolicy {
  /**
   * Sort remaining fields ascending by the UTF-8 bytes of their keys
   */
  sort: boolean;

  /**
   * `pairs`: `k=v&k=v`; `values`: delimiter-free concatenation of values
   */
  join: 'pairs' | 'values';

  /**
   * `suffix`: the shared secret is appended to the joined text
   */
  secretPlacement: 'suffix' | 'none';
}

export const SIGNING_POLICIES: Readonly<Record<SigningProfile, SigningPolicy>> = Object.freeze({
  [SigningProfile.KEYED_DIGEST]: { sort: true, join: 'pairs', secretPlacement: 'suffix' },
  [SigningProfile.MAC]: { sort: true, join: 'pairs', secretPlacement: 'none' },
  [SigningProfile.ASYMMETRIC]: { sort: true, join: 'pairs', secretPlacement: 'none' },
});

export const DEFAULT_SIGNATURE_FIELD = 'sign';

/**
 * Anything that can enumerate its fields (ParamMap, XmlMap)
 */
export interface SigningSource {
  entries(): Iterable<[string, unknown]>;
}

/**
 * Fully resolved canonicalization rules for one channel
 */
export interface SigningRules {
  profile: SigningProfile | SigningPolicy;
  signatureField: string;
  exclude: string[];
  secret?: string;
}

export interface SigningStringOptions {
  signatureField?: string;
  exclude?: string[];
  secret?: string;
}

/**
 * Build the canonical signing string.
 *
 * Empty and null values are dropped here even though containers filter them
 * on `set()`: a container parsed from a notification can still carry them.
 */
export function buildSigningString(
  source: SigningSource,
  profile: SigningProfile | SigningPolicy,
  options: SigningStringOptions = {},
): string {
  const policy = resolvePolicy(profile);
  const excluded = new Set([options.signatureField ?? DEFAULT_SIGNATURE_FIELD, ...(options.exclude ?? [])]);

  const fields: Array<[string, string]> = [];
  for (const [key, value] of source.entries()) {
    if (excluded.has(key) || isEmptyValue(value)) {
      continue;
    }
    fields.push([key, renderParamValue(value)]);
  }

  if (policy.sort) {
    fields.sort(([a], [b]) => compareBytes(a, b));
  }

  const joined =
    policy.join === 'pairs'
      ? fields.map(([key, value]) => `${key}=${value}`).join('&')
      : fields.map(([, value]) => value).join('');

  if (policy.secretPlacement === 'none') {
    return joined;
  }

  if (!options.secret) {
    throw new InvalidKeyMaterialError('Signing profile requires a shared secret in the signing string');
  }

  if (policy.join === 'values') {
    return `${joined}${options.secret}`;
  }
  return joined ? `${joined}&key=${options.secret}` : `key=${options.secret}`;
}

export function resolvePolicy(profile: SigningProfile | SigningPolicy): SigningPolicy {
  return typeof profile === 'string' ? SIGNING_POLICIES[profile] : profile;
}

/**
 * Text form of a field value; nested containers render as JSON
 */
export function renderParamValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (value === null || value === undefined) {
    return '';
  }
  return JSON.stringify(value);
}

export function isEmptyValue(value: unknown): boolean {
  return value === null || value === undefined || value === '';
}

/**
 * Byte-wise comparison of UTF-8 encodings (locale independent)
 */
export function compareBytes(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

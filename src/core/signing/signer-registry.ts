import { SignAlgorithm } from '../domain/enums';
import {
  ConfigError,
  GatewayError,
  InvalidKeyMaterialError,
  UnsupportedAlgorithmError,
} from '../domain/errors';
import { KeyMaterial, Signer, SignerFactory } from '../interfaces/signer.interface';
import { createSigner } from './signers';

function requireSecret(keys: KeyMaterial, algorithm: string): string {
  if (!keys.secret) {
    throw new InvalidKeyMaterialError(`${algorithm} requires a shared secret`, algorithm);
  }
  return keys.secret;
}

export const BUILT_IN_SIGNERS: ReadonlyArray<readonly [string, SignerFactory]> = [
  [
    SignAlgorithm.MD5,
    (keys) =>
      createSigner({
        kind: 'shared-secret-digest',
        digest: 'md5',
        secret: requireSecret(keys, SignAlgorithm.MD5),
        algorithm: SignAlgorithm.MD5,
      }),
  ],
  [
    SignAlgorithm.HMAC_SHA256,
    (keys) =>
      createSigner({
        kind: 'shared-secret-mac',
        hash: 'sha256',
        secret: requireSecret(keys, SignAlgorithm.HMAC_SHA256),
        algorithm: SignAlgorithm.HMAC_SHA256,
      }),
  ],
  [
    SignAlgorithm.RSA,
    (keys) =>
      createSigner({
        kind: 'asymmetric',
        profile: 'legacy',
        privateKey: keys.privateKey,
        publicKey: keys.publicKey,
        algorithm: SignAlgorithm.RSA,
      }),
  ],
  [
    SignAlgorithm.RSA2,
    (keys) =>
      createSigner({
        kind: 'asymmetric',
        profile: 'modern',
        privateKey: keys.privateKey,
        publicKey: keys.publicKey,
        algorithm: SignAlgorithm.RSA2,
      }),
  ],
];

/**
 * SignerRegistry - algorithm identifier to Signer factory
 *
 * Identifiers are case-sensitive. `register` swaps in a whole new map, so a
 * reader never sees a half-applied update; re-registering an identifier
 * replaces the previous factory.
 */
export class SignerRegistry {
  private factories: ReadonlyMap<string, SignerFactory>;

  constructor(entries: Iterable<readonly [string, SignerFactory]> = []) {
    this.factories = new Map(entries);
  }

  register(identifier: string, factory: SignerFactory): this {
    if (!identifier) {
      throw new ConfigError('Signer identifier must be a non-empty string');
    }
    const next = new Map(this.factories);
    next.set(identifier, factory);
    this.factories = next;
    return this;
  }

  /**
   * @throws UnsupportedAlgorithmError when the identifier is not registered
   * @throws InvalidKeyMaterialError when the factory cannot use the keys
   */
  get(identifier: string, keys: KeyMaterial): Signer {
    const factory = this.factories.get(identifier);
    if (!factory) {
      throw new UnsupportedAlgorithmError(identifier);
    }

    try {
      return factory(keys);
    } catch (error) {
      if (error instanceof GatewayError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidKeyMaterialError(`Signer factory for ${identifier} failed: ${reason}`, identifier);
    }
  }

  has(identifier: string): boolean {
    return this.factories.has(identifier);
  }

  identifiers(): string[] {
    return Array.from(this.factories.keys());
  }
}

/**
 * Registry pre-populated with MD5, HMAC-SHA256, RSA and RSA2
 */
export function createDefaultSignerRegistry(): SignerRegistry {
  return new SignerRegistry(BUILT_IN_SIGNERS);
}

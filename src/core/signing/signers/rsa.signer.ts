import * as crypto from 'crypto';
import { InvalidKeyMaterialError } from '../../domain/errors';
import { AsymmetricSpec, Signer } from '../../interfaces/signer.interface';

const DIGESTS: Record<AsymmetricSpec['profile'], string> = {
  legacy: 'RSA-SHA1',
  modern: 'RSA-SHA256',
};

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * RSA PKCS#1 v1.5 signatures, base64 encoded.
 *
 * Either key may be omitted: a private-key-only signer cannot verify and a
 * public-key-only signer cannot sign. Keys are parsed at construction.
 */
export class AsymmetricSigner implements Signer {
  readonly variant = 'asymmetric';
  readonly algorithm: string;

  private readonly digest: string;
  private readonly privateKey?: crypto.KeyObject;
  private readonly publicKey?: crypto.KeyObject;

  constructor(spec: Omit<AsymmetricSpec, 'kind'>) {
    this.algorithm = spec.algorithm ?? (spec.profile === 'legacy' ? 'RSA' : 'RSA2');
    this.digest = DIGESTS[spec.profile];

    if (!spec.privateKey && !spec.publicKey) {
      throw new InvalidKeyMaterialError('Asymmetric signer requires a private or public key', this.algorithm);
    }
    if (spec.privateKey) {
      this.privateKey = parsePrivateKey(spec.privateKey, this.algorithm);
    }
    if (spec.publicKey) {
      this.publicKey = parsePublicKey(spec.publicKey, this.algorithm);
    }
  }

  get canSign(): boolean {
    return this.privateKey !== undefined;
  }

  get canVerify(): boolean {
    return this.publicKey !== undefined;
  }

  sign(content: string): string {
    if (!this.privateKey) {
      throw new InvalidKeyMaterialError('No private key configured for signing', this.algorithm);
    }
    return crypto.createSign(this.digest).update(content, 'utf8').sign(this.privateKey, 'base64');
  }

  verify(content: string, signature: string): boolean {
    if (!this.publicKey) {
      throw new InvalidKeyMaterialError('No public key configured for verification', this.algorithm);
    }

    const compact = signature.replace(/\s+/g, '');
    if (!BASE64.test(compact)) {
      return false;
    }

    try {
      return crypto
        .createVerify(this.digest)
        .update(content, 'utf8')
        .verify(this.publicKey, Buffer.from(compact, 'base64'));
    } catch {
      // OpenSSL rejects signatures of the wrong length
      return false;
    }
  }
}

function isPem(text: string): boolean {
  return text.includes('-----BEGIN');
}

function derBuffer(text: string, algorithm: string): Buffer {
  const compact = text.replace(/\s+/g, '');
  if (!BASE64.test(compact)) {
    throw new InvalidKeyMaterialError('Key material is neither PEM nor base64 DER', algorithm);
  }
  return Buffer.from(compact, 'base64');
}

function ensureRsa(key: crypto.KeyObject, algorithm: string): crypto.KeyObject {
  if (key.asymmetricKeyType !== 'rsa') {
    throw new InvalidKeyMaterialError(
      `Expected an RSA key, got ${key.asymmetricKeyType ?? 'unknown'}`,
      algorithm,
    );
  }
  return key;
}

/**
 * Try each candidate parse in order, returning the first that succeeds
 */
function firstParsed(
  attempts: Array<() => crypto.KeyObject>,
  description: string,
  algorithm: string,
): crypto.KeyObject {
  let lastError: unknown;
  for (const attempt of attempts) {
    try {
      return attempt();
    } catch (error) {
      lastError = error;
    }
  }
  const reason = lastError instanceof Error ? `: ${lastError.message}` : '';
  throw new InvalidKeyMaterialError(`Unable to parse ${description}${reason}`, algorithm);
}

export function parsePrivateKey(text: string, algorithm: string): crypto.KeyObject {
  const trimmed = text.trim();
  const key = isPem(trimmed)
    ? firstParsed([() => crypto.createPrivateKey(trimmed)], 'private key', algorithm)
    : firstParsed(
        [
          () => crypto.createPrivateKey({ key: derBuffer(trimmed, algorithm), format: 'der', type: 'pkcs8' }),
          () => crypto.createPrivateKey({ key: derBuffer(trimmed, algorithm), format: 'der', type: 'pkcs1' }),
        ],
        'private key',
        algorithm,
      );
  return ensureRsa(key, algorithm);
}

export function parsePublicKey(text: string, algorithm: string): crypto.KeyObject {
  const trimmed = text.trim();
  const key = isPem(trimmed)
    ? firstParsed([() => crypto.createPublicKey(trimmed)], 'public key', algorithm)
    : firstParsed(
        [
          () => crypto.createPublicKey({ key: derBuffer(trimmed, algorithm), format: 'der', type: 'spki' }),
          () => crypto.createPublicKey({ key: derBuffer(trimmed, algorithm), format: 'der', type: 'pkcs1' }),
        ],
        'public key',
        algorithm,
      );
  return ensureRsa(key, algorithm);
}

/**
 * Signer variants. Callers only ever see the `Signer` capability; the variant
 * is informational.
 */
export type SignerVariant = 'shared-secret-digest' | 'shared-secret-mac' | 'asymmetric';

/**
 * Signs a canonical string and verifies (string, signature) pairs
 */
export interface Signer {
  /**
   * Registry identifier the signer was built for (e.g. 'MD5', 'RSA2')
   */
  readonly algorithm: string;

  readonly variant: SignerVariant;

  /**
   * False for an asymmetric signer built with a public key only
   */
  readonly canSign: boolean;

  /**
   * False for an asymmetric signer built with a private key only
   */
  readonly canVerify: boolean;

  /**
   * @throws InvalidKeyMaterialError when the signer holds no signing key
   */
  sign(content: string): string;

  /**
   * Never throws on malformed signature text; returns false instead
   */
  verify(content: string, signature: string): boolean;
}

/**
 * Key material for one channel. Asymmetric keys are PEM or bare base64 DER.
 */
export interface KeyMaterial {
  secret?: string;
  privateKey?: string;
  publicKey?: string;
}

/**
 * Builds a configured Signer; throws InvalidKeyMaterialError on unusable keys
 */
export type SignerFactory = (keys: KeyMaterial) => Signer;

export interface SharedSecretDigestSpec {
  kind: 'shared-secret-digest';
  digest: 'md5' | 'sha256';
  secret: string;

  /**
   * Digest `content + secret` instead of `content`. Leave unset when the
   * signing profile already places the secret in the string.
   */
  appendSecret?: boolean;

  algorithm?: string;
}

export interface SharedSecretMacSpec {
  kind: 'shared-secret-mac';
  hash: 'sha256' | 'sha512';
  secret: string;
  algorithm?: string;
}

export interface AsymmetricSpec {
  kind: 'asymmetric';

  /**
   * `legacy`: PKCS#1 v1.5 with SHA-1; `modern`: PKCS#1 v1.5 with SHA-256
   */
  profile: 'legacy' | 'modern';

  privateKey?: string;
  publicKey?: string;
  algorithm?: string;
}

export type SignerSpec = SharedSecretDigestSpec | SharedSecretMacSpec | AsymmetricSpec;

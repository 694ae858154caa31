import { Signer, SignerSpec } from '../../interfaces/signer.interface';
import { SharedSecretDigestSigner } from './digest.signer';
import { SharedSecretMacSigner } from './hmac.signer';
import { AsymmetricSigner } from './rsa.signer';

export * from './digest.signer';
export * from './hmac.signer';
export * from './rsa.signer';

/**
 * Build a Signer from its tagged spec
 */
export function createSigner(spec: SignerSpec): Signer {
  switch (spec.kind) {
    case 'shared-secret-digest':
      return new SharedSecretDigestSigner(spec);
    case 'shared-secret-mac':
      return new SharedSecretMacSigner(spec);
    case 'asymmetric':
      return new AsymmetricSigner(spec);
  }
}

import * as crypto from 'crypto';
import { InvalidKeyMaterialError } from '../../domain/errors';
import { Signer, SharedSecretMacSpec } from '../../interfaces/signer.interface';
import { timingSafeEqualText } from '../timing-safe';

/**
 * HMAC keyed with the shared secret; uppercase hex output
 */
export class SharedSecretMacSigner implements Signer {
  readonly variant = 'shared-secret-mac';
  readonly canSign = true;
  readonly canVerify = true;
  readonly algorithm: string;

  private readonly hash: SharedSecretMacSpec['hash'];
  private readonly secret: string;

  constructor(spec: Omit<SharedSecretMacSpec, 'kind'>) {
    if (!spec.secret) {
      throw new InvalidKeyMaterialError('HMAC signer requires a non-empty secret', spec.algorithm);
    }
    this.hash = spec.hash;
    this.secret = spec.secret;
    this.algorithm = spec.algorithm ?? `HMAC-${spec.hash.toUpperCase()}`;
  }

  sign(content: string): string {
    return crypto.createHmac(this.hash, this.secret).update(content, 'utf8').digest('hex').toUpperCase();
  }

  verify(content: string, signature: string): boolean {
    return timingSafeEqualText(this.sign(content), signature);
  }
}

import * as crypto from 'crypto';
import { InvalidKeyMaterialError } from '../../domain/errors';
import { Signer, SharedSecretDigestSpec } from '../../interfaces/signer.interface';
import { timingSafeEqualText } from '../timing-safe';

/**
 * Unkeyed digest over a string that already carries the shared secret
 * (or, with `appendSecret`, over `content + secret`). Uppercase hex output.
 */
export class SharedSecretDigestSigner implements Signer {
  readonly variant = 'shared-secret-digest';
  readonly canSign = true;
  readonly canVerify = true;
  readonly algorithm: string;

  private readonly digest: SharedSecretDigestSpec['digest'];
  private readonly secret: string;
  private readonly appendSecret: boolean;

  constructor(spec: Omit<SharedSecretDigestSpec, 'kind'>) {
    if (!spec.secret) {
      throw new InvalidKeyMaterialError('Shared-secret digest requires a non-empty secret', spec.algorithm);
    }
    this.digest = spec.digest;
    this.secret = spec.secret;
    this.appendSecret = spec.appendSecret ?? false;
    this.algorithm = spec.algorithm ?? spec.digest.toUpperCase();
  }

  sign(content: string): string {
    const input = this.appendSecret ? `${content}${this.secret}` : content;
    return crypto.createHash(this.digest).update(input, 'utf8').digest('hex').toUpperCase();
  }

  verify(content: string, signature: string): boolean {
    return timingSafeEqualText(this.sign(content), signature);
  }
}

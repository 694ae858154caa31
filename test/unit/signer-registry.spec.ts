import {
  ConfigError,
  createDefaultSignerRegistry,
  createSigner,
  GatewayErrorCode,
  InvalidKeyMaterialError,
  SignerFactory,
  SignerRegistry,
  UnsupportedAlgorithmError,
} from '../../src';

describe('SignerRegistry', () => {
  let registry: SignerRegistry;

  beforeEach(() => {
    registry = createDefaultSignerRegistry();
  });

  describe('built-in identifiers', () => {
    it('should register MD5, HMAC-SHA256, RSA and RSA2', () => {
      expect(registry.identifiers()).toEqual(['MD5', 'HMAC-SHA256', 'RSA', 'RSA2']);
    });

    it('should build a configured MD5 signer', () => {
      const signer = registry.get('MD5', { secret: 'secret' });

      expect(signer.algorithm).toBe('MD5');
      expect(signer.sign('out_trade_no=A1&total_amount=0.01&key=secret')).toBe(
        'F0F8FA33DF77249D6F1A55C80F32FE44',
      );
    });

    it('should require a secret for shared-secret identifiers', () => {
      expect(() => registry.get('HMAC-SHA256', {})).toThrow('HMAC-SHA256 requires a shared secret');
    });

    it('should require a key for asymmetric identifiers', () => {
      expect(() => registry.get('RSA2', { secret: 'test-secret' })).toThrow(InvalidKeyMaterialError);
    });
  });

  describe('lookup', () => {
    it('should fail with UnsupportedAlgorithm for an unknown identifier', () => {
      let caught: unknown;
      try {
        registry.get('FOO', { secret: 'test-secret' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(UnsupportedAlgorithmError);
      expect(caught).toMatchObject({
        code: GatewayErrorCode.UNSUPPORTED_ALGORITHM,
        message: 'Unsupported signing algorithm: FOO',
      });
    });

    it('should treat identifiers as case-sensitive', () => {
      expect(registry.has('md5')).toBe(false);
      expect(() => registry.get('md5', { secret: 'test-secret' })).toThrow(UnsupportedAlgorithmError);
    });
  });

  describe('register', () => {
    const sha256Digest: SignerFactory = (keys) =>
      createSigner({
        kind: 'shared-secret-digest',
        digest: 'sha256',
        secret: keys.secret ?? '',
        algorithm: 'SHA256',
      });

    it('should add a custom identifier at runtime', () => {
      registry.register('SHA256', sha256Digest);

      const signer = registry.get('SHA256', { secret: 'secret' });

      expect(signer.sign('out_trade_no=A1&total_amount=0.01&key=secret')).toBe(
        '2155B2BE7D861348331DD1862F1179A5B507BD75CDADED6199DFED50B385C568',
      );
    });

    it('should replace an existing entry (last write wins)', () => {
      registry.register('MD5', sha256Digest);

      expect(registry.get('MD5', { secret: 'test-secret' }).algorithm).toBe('SHA256');
      expect(registry.identifiers()).toHaveLength(4);
    });

    it('should reject an empty identifier', () => {
      expect(() => registry.register('', sha256Digest)).toThrow(ConfigError);
    });

    it('should not leak registrations between registries', () => {
      registry.register('SHA256', sha256Digest);

      expect(createDefaultSignerRegistry().has('SHA256')).toBe(false);
    });

    it('should wrap foreign factory errors as InvalidKeyMaterial', () => {
      registry.register('BROKEN', () => {
        throw new TypeError('boom');
      });

      expect(() => registry.get('BROKEN', {})).toThrow(
        new InvalidKeyMaterialError('Signer factory for BROKEN failed: boom', 'BROKEN'),
      );
    });

    it('should pass gateway errors from factories through unchanged', () => {
      registry.register('EMPTY', sha256Digest);

      expect(() => registry.get('EMPTY', {})).toThrow('Shared-secret digest requires a non-empty secret');
    });
  });
});

import {
  ChannelSigningService,
  ConfigError,
  createDefaultSignerRegistry,
  decodePayload,
  GatewayErrorCode,
  InvalidKeyMaterialError,
  ParamMap,
  PaymentChannel,
  resolveChannelProfiles,
  WireFormat,
} from '../../src';
import { generateRsaKeyPair, RsaKeyPair } from '../helpers/keys';
import { createTestLogger, loggedText, TestLogger } from '../helpers/logger';

describe('ChannelSigningService', () => {
  let keys: RsaKeyPair;
  let logger: TestLogger;
  let service: ChannelSigningService;

  const order = () => new ParamMap().set('out_trade_no', 'A1').set('total_fee', 1);

  beforeAll(() => {
    keys = generateRsaKeyPair();
  });

  beforeEach(() => {
    logger = createTestLogger();
    const profiles = resolveChannelProfiles(
      [
        { channel: PaymentChannel.WECHAT, keys: { secret: 'test-secret' } },
        { channel: PaymentChannel.QQ, algorithm: 'HMAC-SHA256', keys: { secret: 'test-secret' } },
        { channel: PaymentChannel.ALIPAY, keys: { privateKey: keys.privateKey, publicKey: keys.publicKey } },
      ],
      createDefaultSignerRegistry(),
    );
    service = new ChannelSigningService(profiles, logger);
  });

  describe('buildSigningString', () => {
    it('should append the secret for keyed-digest channels', () => {
      expect(service.buildSigningString(PaymentChannel.WECHAT, order())).toBe(
        'out_trade_no=A1&total_fee=1&key=test-secret',
      );
    });

    it('should not apply notification-only exclusions to outbound requests', () => {
      const params = new ParamMap().set('sign_type', 'RSA2').set('app_id', 'test-app');

      expect(service.buildSigningString(PaymentChannel.ALIPAY, params)).toBe('app_id=test-app&sign_type=RSA2');
    });
  });

  describe('sign', () => {
    it('should add an MD5 signature', () => {
      const params = service.sign(PaymentChannel.WECHAT, order());

      expect(params.get('sign')).toBe('C8B3F41CA24E4093382B1B43EEF01D28');
      expect(logger.debug).toHaveBeenCalledWith('Signed 2 fields for wechat with MD5');
    });

    it('should add an HMAC-SHA256 signature', () => {
      const params = service.sign(PaymentChannel.QQ, order());

      expect(params.get('sign')).toBe('D5000AD760FF2FDF24C1C1F7FEDACFBF9CF6C11032D599EA01F2C7BD5CF35D2F');
    });

    it('should replace a stale signature', () => {
      const params = order().set('sign', 'STALE');

      expect(service.sign(PaymentChannel.WECHAT, params).get('sign')).toBe('C8B3F41CA24E4093382B1B43EEF01D28');
    });

    it('should leave empty values out of the signature', () => {
      const params = order().set('attach', '');

      expect(service.sign(PaymentChannel.WECHAT, params).get('sign')).toBe('C8B3F41CA24E4093382B1B43EEF01D28');
    });

    it('should fail loudly without a signing key', () => {
      const verifyOnly = new ChannelSigningService(
        resolveChannelProfiles(
          [{ channel: PaymentChannel.ALIPAY, keys: { publicKey: keys.publicKey } }],
          createDefaultSignerRegistry(),
        ),
        logger,
      );

      expect(() => verifyOnly.sign(PaymentChannel.ALIPAY, order())).toThrow(
        new InvalidKeyMaterialError('Channel alipay has no key to sign requests with'),
      );
    });

    it('should reject an unconfigured channel', () => {
      expect(() => service.sign(PaymentChannel.SAOBEI, order())).toThrow(
        new ConfigError('Channel saobei is not configured'),
      );
    });
  });

  describe('signToWire', () => {
    it('should encode a signed markup request', () => {
      expect(service.signToWire(PaymentChannel.WECHAT, order())).toBe(
        '<xml><out_trade_no>A1</out_trade_no><total_fee>1</total_fee>' +
          '<sign>C8B3F41CA24E4093382B1B43EEF01D28</sign></xml>',
      );
    });

    it('should encode a signed form request that verifies', () => {
      const wire = service.signToWire(PaymentChannel.ALIPAY, new ParamMap().set('out_trade_no', 'A1'));

      const result = service.verifyResponse(PaymentChannel.ALIPAY, decodePayload(WireFormat.FORM, wire));

      expect(result.success).toBe(true);
      expect(result.data).toEqual({ out_trade_no: 'A1' });
    });
  });

  describe('verifyResponse', () => {
    it('should accept a correctly signed response without modifying it', () => {
      const response = service.sign(PaymentChannel.WECHAT, order());

      const result = service.verifyResponse(PaymentChannel.WECHAT, response);

      expect(result.success).toBe(true);
      expect(result.data).toEqual({ out_trade_no: 'A1', total_fee: 1 });
      expect(response.contains('sign')).toBe(true);
    });

    it('should fail on a missing signature', () => {
      const result = service.verifyResponse(PaymentChannel.WECHAT, order());

      expect(result.code).toBe(GatewayErrorCode.SIGNATURE_ERROR);
      expect(result.error).toBe("Missing signature field 'sign'");
    });

    it('should fail on a tampered response and warn', () => {
      const response = service.sign(PaymentChannel.WECHAT, order()).set('total_fee', 100);

      const result = service.verifyResponse(PaymentChannel.WECHAT, response);

      expect(result.success).toBe(false);
      expect(result.error).toBe('Signature verification failed');
      expect(logger.warn).toHaveBeenCalledWith('Response signature verification failed for wechat');
    });

    it('should report a missing verification key as a failure', () => {
      const signOnly = new ChannelSigningService(
        resolveChannelProfiles(
          [{ channel: PaymentChannel.ALIPAY, keys: { privateKey: keys.privateKey } }],
          createDefaultSignerRegistry(),
        ),
        logger,
      );
      const response = signOnly.sign(PaymentChannel.ALIPAY, order());

      const result = signOnly.verifyResponse(PaymentChannel.ALIPAY, response);

      expect(result.code).toBe(GatewayErrorCode.INVALID_KEY_MATERIAL);
    });
  });

  it('should list configured channels', () => {
    expect(service.configuredChannels()).toEqual([PaymentChannel.WECHAT, PaymentChannel.QQ, PaymentChannel.ALIPAY]);
  });

  it('should never log secrets or signatures', () => {
    const signed = service.sign(PaymentChannel.WECHAT, order());
    service.verifyResponse(PaymentChannel.WECHAT, signed.set('total_fee', 2));

    const logged = loggedText(logger);
    expect(logged).not.toContain('test-secret');
    expect(logged).not.toContain('C8B3F41CA24E4093382B1B43EEF01D28');
  });
});

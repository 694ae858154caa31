import {
  buildSigningString,
  createDefaultSignerRegistry,
  encodePayload,
  getChannelDefinition,
  KeyMaterial,
  ParamMap,
  PaymentChannel,
  resolveChannelProfile,
  signingRulesFor,
  SignerRegistry,
  WireFormat,
} from '../../core';

/**
 * Form bodies decode leniently, so the form sample is invalid UTF-8 instead
 */
const MALFORMED_BODIES: Record<WireFormat, Buffer> = {
  [WireFormat.FORM]: Buffer.from([0x6f, 0x75, 0x74, 0x3d, 0xff, 0xfe]),
  [WireFormat.XML]: Buffer.from('<xml><return_code>SUCCESS</xml>', 'utf8'),
  [WireFormat.JSON]: Buffer.from('{ invalid json }', 'utf8'),
};

/**
 * Factory for generating signed notification payloads
 * Used for testing notification handling without real providers
 */
export class MockNotificationFactory {
  private static registry = createDefaultSignerRegistry();

  /**
   * Generate a payment successful notification
   */
  static paymentSuccessful(options: NotificationOptions = {}): NotificationPayload {
    return this.build(options, true);
  }

  /**
   * Generate a payment failed notification
   */
  static paymentFailed(options: NotificationOptions = {}): NotificationPayload {
    return this.build(options, false);
  }

  /**
   * Generate a notification whose signature does not match its fields
   */
  static invalidSignature(options: NotificationOptions = {}): NotificationPayload {
    const channel = options.channel ?? PaymentChannel.WECHAT;
    const definition = getChannelDefinition(channel);
    const valid = this.paymentSuccessful(options);

    // Tamper with the amount after signing
    const fields = { ...valid.fields, [this.amountField(channel)]: '999999' };
    return this.encode(channel, fields, valid.signature, definition.signatureField);
  }

  /**
   * Generate a notification without a signature field
   */
  static missingSignature(options: NotificationOptions = {}): NotificationPayload {
    const channel = options.channel ?? PaymentChannel.WECHAT;
    const { signatureField } = getChannelDefinition(channel);
    const fields = { ...this.paymentSuccessful(options).fields };
    delete fields[signatureField];
    return this.encode(channel, fields, '', signatureField);
  }

  /**
   * Generate a body that cannot be decoded in the channel's wire format
   */
  static malformedPayload(channel: PaymentChannel = PaymentChannel.WECHAT): NotificationPayload {
    const { wireFormat, acknowledgement } = getChannelDefinition(channel);
    return {
      channel,
      body: MALFORMED_BODIES[wireFormat],
      contentType: acknowledgement.contentType,
      fields: {},
      signature: '',
    };
  }

  /**
   * Generate a byte-identical re-delivery
   */
  static duplicate(original: NotificationPayload): NotificationPayload {
    return { ...original, body: Buffer.from(original.body), fields: { ...original.fields } };
  }

  /**
   * Generate a batch of notifications alternating success and failure
   */
  static batch(count: number, options: NotificationOptions = {}): NotificationPayload[] {
    const notifications: NotificationPayload[] = [];

    for (let i = 0; i < count; i++) {
      const itemOptions = { ...options, reference: `${options.reference ?? 'batch'}_${i}` };
      notifications.push(
        i % 2 === 0 ? this.paymentSuccessful(itemOptions) : this.paymentFailed(itemOptions),
      );
    }

    return notifications;
  }

  private static build(options: NotificationOptions, successful: boolean): NotificationPayload {
    const channel = options.channel ?? PaymentChannel.WECHAT;
    const keys: KeyMaterial = {
      secret: options.secret ?? 'test-secret',
      privateKey: options.privateKey,
    };
    const profile = resolveChannelProfile(
      { channel, algorithm: options.algorithm, keys },
      options.registry ?? this.registry,
    );

    const fields: Record<string, string> = {
      ...this.baseFields(channel, options, successful, profile.algorithm),
      ...options.fields,
    };

    const params = ParamMap.fromRecord(fields);
    const rules = signingRulesFor(profile, 'notification');
    const signature = profile.signer.sign(buildSigningString(params, rules.profile, rules));

    return this.encode(channel, fields, signature, profile.definition.signatureField);
  }

  private static encode(
    channel: PaymentChannel,
    fields: Record<string, string>,
    signature: string,
    signatureField: string,
  ): NotificationPayload {
    const definition = getChannelDefinition(channel);
    const signed = signature ? { ...fields, [signatureField]: signature } : fields;
    const params = ParamMap.fromRecord(signed);

    return {
      channel,
      body: Buffer.from(encodePayload(definition.wireFormat, params, definition.xmlRootTag), 'utf8'),
      contentType: definition.acknowledgement.contentType,
      fields: signed,
      signature,
    };
  }

  private static baseFields(
    channel: PaymentChannel,
    options: NotificationOptions,
    successful: boolean,
    algorithm: string,
  ): Record<string, string> {
    const reference = options.reference ?? this.generateRef('order');
    const amount = options.amount ?? '0.01';

    switch (channel) {
      case PaymentChannel.ALIPAY:
        return {
          notify_id: this.generateRef('notify'),
          out_trade_no: reference,
          total_amount: amount,
          trade_no: this.generateRef('trade'),
          trade_status: successful ? 'TRADE_SUCCESS' : 'TRADE_CLOSED',
          sign_type: algorithm,
        };
      case PaymentChannel.WECHAT:
      case PaymentChannel.QQ:
        return {
          return_code: 'SUCCESS',
          result_code: successful ? 'SUCCESS' : 'FAIL',
          out_trade_no: reference,
          total_fee: toMinorUnits(amount),
          transaction_id: this.generateRef('txn'),
          nonce_str: this.generateRef('nonce'),
        };
      case PaymentChannel.ALLINPAY:
        return {
          cusorderid: reference,
          trxamt: toMinorUnits(amount),
          trxid: this.generateRef('trx'),
          trxstatus: successful ? '0000' : '3999',
        };
      case PaymentChannel.SAOBEI:
        return {
          result_code: successful ? '01' : '02',
          terminal_trace: reference,
          total_fee: toMinorUnits(amount),
          channel_trade_no: this.generateRef('trade'),
        };
    }
  }

  private static amountField(channel: PaymentChannel): string {
    switch (channel) {
      case PaymentChannel.ALIPAY:
        return 'total_amount';
      case PaymentChannel.ALLINPAY:
        return 'trxamt';
      default:
        return 'total_fee';
    }
  }

  /**
   * Generate a reference ID
   */
  private static generateRef(prefix: string): string {
    return `${prefix}_${Date.now()}_${Math.random().toString(36).substring(7)}`;
  }
}

function toMinorUnits(amount: string): string {
  return String(Math.round(Number(amount) * 100));
}

/**
 * Options for notification generation
 */
export interface NotificationOptions {
  channel?: PaymentChannel;
  algorithm?: string;

  /**
   * Shared secret for MD5 / HMAC channels
   */
  secret?: string;

  /**
   * Signing key for RSA channels
   */
  privateKey?: string;

  registry?: SignerRegistry;
  reference?: string;

  /**
   * Major-unit amount, e.g. '0.01'
   */
  amount?: string;

  /**
   * Extra or overriding fields
   */
  fields?: Record<string, string>;
}

/**
 * Generated notification payload
 */
export interface NotificationPayload {
  channel: PaymentChannel;
  body: Buffer;
  contentType: string;

  /**
   * Every field on the wire, signature included
   */
  fields: Record<string, string>;

  signature: string;
}

/**
 * Test helper for notification scenarios
 */
export class NotificationScenarios {
  /**
   * Generate notifications for testing re-delivery
   */
  static redelivery(options: NotificationOptions = {}): {
    original: NotificationPayload;
    duplicate: NotificationPayload;
  } {
    const original = MockNotificationFactory.paymentSuccessful(options);
    return { original, duplicate: MockNotificationFactory.duplicate(original) };
  }

  /**
   * Generate notifications for testing signature verification
   */
  static signatureVerification(options: NotificationOptions = {}): {
    valid: NotificationPayload;
    invalid: NotificationPayload;
    missing: NotificationPayload;
    malformed: NotificationPayload;
  } {
    return {
      valid: MockNotificationFactory.paymentSuccessful(options),
      invalid: MockNotificationFactory.invalidSignature(options),
      missing: MockNotificationFactory.missingSignature(options),
      malformed: MockNotificationFactory.malformedPayload(options.channel),
    };
  }
}

import {
  PaymentChannel,
  SignAlgorithm,
  SigningProfile,
  WireFormat,
} from '../domain/enums';
import { ConfigError } from '../domain/errors';

/**
 * Body a channel expects in reply to a notification.
 * Providers pattern-match these bytes, so they never vary with the failure reason.
 */
export interface AcknowledgementContract {
  success: string;
  failure: string;
  contentType: string;
}

/**
 * Static protocol facts for one channel
 */
export interface ChannelDefinition {
  channel: PaymentChannel;
  wireFormat: WireFormat;

  /**
   * Root element for XML channels
   */
  xmlRootTag?: string;

  signatureField: string;
  defaultAlgorithm: string;
  defaultProfile: SigningProfile;

  /**
   * Profile implied by a given algorithm when the config does not name one
   */
  algorithmProfiles: Partial<Record<string, SigningProfile>>;

  /**
   * Fields the provider leaves out of the notification signing string only
   */
  notificationExclusions: string[];

  acknowledgement: AcknowledgementContract;
}

const XML_ACKNOWLEDGEMENT: AcknowledgementContract = {
  success: '<xml><return_code>SUCCESS</return_code><return_msg>OK</return_msg></xml>',
  failure: '<xml><return_code>FAIL</return_code><return_msg>FAIL</return_msg></xml>',
  contentType: 'application/xml',
};

const SHARED_SECRET_PROFILES: Partial<Record<string, SigningProfile>> = {
  [SignAlgorithm.MD5]: SigningProfile.KEYED_DIGEST,
  [SignAlgorithm.HMAC_SHA256]: SigningProfile.MAC,
};

export const CHANNEL_DEFINITIONS: Readonly<Record<PaymentChannel, ChannelDefinition>> = Object.freeze({
  [PaymentChannel.ALIPAY]: {
    channel: PaymentChannel.ALIPAY,
    wireFormat: WireFormat.FORM,
    signatureField: 'sign',
    defaultAlgorithm: SignAlgorithm.RSA2,
    defaultProfile: SigningProfile.ASYMMETRIC,
    algorithmProfiles: {
      [SignAlgorithm.RSA]: SigningProfile.ASYMMETRIC,
      [SignAlgorithm.RSA2]: SigningProfile.ASYMMETRIC,
    },
    notificationExclusions: ['sign_type'],
    acknowledgement: {
      success: 'success',
      failure: 'failure',
      contentType: 'text/plain',
    },
  },
  [PaymentChannel.WECHAT]: {
    channel: PaymentChannel.WECHAT,
    wireFormat: WireFormat.XML,
    xmlRootTag: 'xml',
    signatureField: 'sign',
    defaultAlgorithm: SignAlgorithm.MD5,
    defaultProfile: SigningProfile.KEYED_DIGEST,
    algorithmProfiles: SHARED_SECRET_PROFILES,
    notificationExclusions: [],
    acknowledgement: XML_ACKNOWLEDGEMENT,
  },
  [PaymentChannel.QQ]: {
    channel: PaymentChannel.QQ,
    wireFormat: WireFormat.XML,
    xmlRootTag: 'xml',
    signatureField: 'sign',
    defaultAlgorithm: SignAlgorithm.MD5,
    defaultProfile: SigningProfile.KEYED_DIGEST,
    algorithmProfiles: SHARED_SECRET_PROFILES,
    notificationExclusions: [],
    acknowledgement: XML_ACKNOWLEDGEMENT,
  },
  [PaymentChannel.ALLINPAY]: {
    channel: PaymentChannel.ALLINPAY,
    wireFormat: WireFormat.FORM,
    signatureField: 'sign',
    defaultAlgorithm: SignAlgorithm.MD5,
    defaultProfile: SigningProfile.KEYED_DIGEST,
    algorithmProfiles: SHARED_SECRET_PROFILES,
    notificationExclusions: [],
    acknowledgement: {
      success: 'success',
      failure: 'fail',
      contentType: 'text/plain',
    },
  },
  [PaymentChannel.SAOBEI]: {
    channel: PaymentChannel.SAOBEI,
    wireFormat: WireFormat.JSON,
    signatureField: 'key_sign',
    defaultAlgorithm: SignAlgorithm.MD5,
    defaultProfile: SigningProfile.KEYED_DIGEST,
    algorithmProfiles: SHARED_SECRET_PROFILES,
    notificationExclusions: [],
    acknowledgement: {
      success: '{"return_code":"01","return_msg":"success"}',
      failure: '{"return_code":"02","return_msg":"fail"}',
      contentType: 'application/json',
    },
  },
});

export function isPaymentChannel(value: string): value is PaymentChannel {
  return Object.values<string>(PaymentChannel).includes(value);
}

export function getChannelDefinition(channel: PaymentChannel): ChannelDefinition {
  const definition = CHANNEL_DEFINITIONS[channel];
  if (!definition) {
    throw new ConfigError(`Unknown payment channel: ${String(channel)}`);
  }
  return definition;
}

/**
 * Acknowledgement body for a notification outcome
 */
export function acknowledgementFor(channel: PaymentChannel, accepted: boolean): string {
  const { acknowledgement } = getChannelDefinition(channel);
  return accepted ? acknowledgement.success : acknowledgement.failure;
}

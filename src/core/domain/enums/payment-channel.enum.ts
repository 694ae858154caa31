/**
 * Supported payment channels.
 * Each channel fixes a wire format, a signature field and an acknowledgement contract.
 */
export enum PaymentChannel {
  ALIPAY = 'alipay',
  WECHAT = 'wechat',
  QQ = 'qq',
  ALLINPAY = 'allinpay',
  SAOBEI = 'saobei',
}

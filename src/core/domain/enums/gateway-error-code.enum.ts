/**
 * Error codes carried by GatewayError and by failed GatewayResults
 */
export enum GatewayErrorCode {
  FORMAT_ERROR = 'FORMAT_ERROR',
  UNSUPPORTED_ALGORITHM = 'UNSUPPORTED_ALGORITHM',
  INVALID_KEY_MATERIAL = 'INVALID_KEY_MATERIAL',
  SIGNATURE_ERROR = 'SIGNATURE_ERROR',
  CALLBACK_FAILURE = 'CALLBACK_FAILURE',
  CONFIG_ERROR = 'CONFIG_ERROR',
}

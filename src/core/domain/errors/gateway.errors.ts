import { GatewayErrorCode } from '../enums';

/**
 * Base error for every failure raised by the signing core
 */
export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly code: GatewayErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GatewayError';
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      message: this.message,
      code: this.code,
      details: this.details ?? {},
    };
  }
}

/**
 * Malformed wire payload (empty body, bad encoding, invalid markup/JSON)
 */
export class FormatError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, GatewayErrorCode.FORMAT_ERROR, details);
    this.name = 'FormatError';
  }
}

/**
 * Requested signer identifier is not registered
 */
export class UnsupportedAlgorithmError extends GatewayError {
  constructor(public readonly algorithm: string) {
    super(`Unsupported signing algorithm: ${algorithm}`, GatewayErrorCode.UNSUPPORTED_ALGORITHM, {
      algorithm,
    });
    this.name = 'UnsupportedAlgorithmError';
  }
}

/**
 * Key material missing or not parseable into the shape a signer needs
 */
export class InvalidKeyMaterialError extends GatewayError {
  constructor(
    message: string,
    public readonly algorithm?: string,
  ) {
    super(message, GatewayErrorCode.INVALID_KEY_MATERIAL, algorithm ? { algorithm } : undefined);
    this.name = 'InvalidKeyMaterialError';
  }
}

/**
 * Signature field absent or signature did not verify
 */
export class SignatureError extends GatewayError {
  constructor(
    message: string,
    public readonly channel?: string,
  ) {
    super(message, GatewayErrorCode.SIGNATURE_ERROR, channel ? { channel } : undefined);
    this.name = 'SignatureError';
  }
}

/**
 * Business callback rejected the notification or threw
 */
export class CallbackFailureError extends GatewayError {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(
      message,
      GatewayErrorCode.CALLBACK_FAILURE,
      originalError ? { originalError: originalError.message } : undefined,
    );
    this.name = 'CallbackFailureError';
  }
}

/**
 * Invalid module or channel configuration
 */
export class ConfigError extends GatewayError {
  constructor(
    message: string,
    public readonly violations: string[] = [],
  ) {
    super(message, GatewayErrorCode.CONFIG_ERROR, violations.length ? { violations } : undefined);
    this.name = 'ConfigError';
  }
}

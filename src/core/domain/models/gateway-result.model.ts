import { GatewayError } from '../errors';

/**
 * Uniform return value of every public operation.
 * A success never carries `error`/`code`; a failure never carries `data`.
 */
export class GatewayResult<T = unknown> {
  private constructor(
    public readonly success: boolean,
    public readonly data?: T,
    public readonly error?: string,
    public readonly code?: string,
    public readonly rawResponse?: string,
  ) {
    Object.freeze(this);
  }

  static ok<T>(data?: T, rawResponse?: string): GatewayResult<T> {
    return new GatewayResult<T>(true, data, undefined, undefined, rawResponse);
  }

  static fail<T = never>(error: string, code?: string, rawResponse?: string): GatewayResult<T> {
    return new GatewayResult<T>(false, undefined, error, code, rawResponse);
  }

  /**
   * Failure carrying the message and code of a GatewayError
   */
  static fromError<T = never>(error: GatewayError, rawResponse?: string): GatewayResult<T> {
    return GatewayResult.fail<T>(error.message, error.code, rawResponse);
  }

  toJSON(): Record<string, unknown> {
    return {
      success: this.success,
      data: this.data ?? null,
      error: this.error ?? null,
      code: this.code ?? null,
      raw_response: this.rawResponse ?? null,
    };
  }
}

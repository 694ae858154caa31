import { GatewayErrorCode, GatewayResult, SignatureError } from '../../src';

describe('GatewayResult', () => {
  it('should carry data on success and no error', () => {
    const result = GatewayResult.ok({ trade_no: 'T1' }, 'raw');

    expect(result.success).toBe(true);
    expect(result.data).toEqual({ trade_no: 'T1' });
    expect(result.error).toBeUndefined();
    expect(result.code).toBeUndefined();
    expect(result.rawResponse).toBe('raw');
  });

  it('should carry error and code on failure and no data', () => {
    const result = GatewayResult.fail('Declined', 'ORDER_CLOSED');

    expect(result.success).toBe(false);
    expect(result.data).toBeUndefined();
    expect(result.error).toBe('Declined');
    expect(result.code).toBe('ORDER_CLOSED');
  });

  it('should take message and code from a gateway error', () => {
    const result = GatewayResult.fromError(new SignatureError('Signature verification failed'), '<xml/>');

    expect(result.error).toBe('Signature verification failed');
    expect(result.code).toBe(GatewayErrorCode.SIGNATURE_ERROR);
    expect(result.rawResponse).toBe('<xml/>');
  });

  it('should be immutable', () => {
    const result = GatewayResult.ok('value');

    expect(Object.isFrozen(result)).toBe(true);
  });

  it('should serialize absent members as null', () => {
    expect(GatewayResult.ok().toJSON()).toEqual({
      success: true,
      data: null,
      error: null,
      code: null,
      raw_response: null,
    });
    expect(JSON.stringify(GatewayResult.fail('bad', 'E1', 'raw'))).toBe(
      '{"success":false,"data":null,"error":"bad","code":"E1","raw_response":"raw"}',
    );
  });
});

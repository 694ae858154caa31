/**
 * Built-in signer identifiers.
 * Identifiers are case-sensitive; custom ones may be registered at runtime.
 */
export enum SignAlgorithm {
  MD5 = 'MD5',
  HMAC_SHA256 = 'HMAC-SHA256',

  /**
   * RSA PKCS#1 v1.5 over SHA-1 (legacy profile)
   */
  RSA = 'RSA',

  /**
   * RSA PKCS#1 v1.5 over SHA-256 (modern profile)
   */
  RSA2 = 'RSA2',
}

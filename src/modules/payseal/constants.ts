/**
 * Injection tokens for PaySeal module
 */

export const PAYSEAL_CONFIG = Symbol('PAYSEAL_CONFIG');
export const SIGNER_REGISTRY = Symbol('SIGNER_REGISTRY');
export const CHANNEL_PROFILES = Symbol('CHANNEL_PROFILES');
export const NOTIFICATION_VERIFIER = Symbol('NOTIFICATION_VERIFIER');
export const CHANNEL_SIGNING_SERVICE = Symbol('CHANNEL_SIGNING_SERVICE');

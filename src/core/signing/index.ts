export * from './canonicalization';
export * from './signers';
export * from './signer-registry';
export * from './timing-safe';

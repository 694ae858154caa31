// Interface and type exports
export * from './signer.interface';
export * from './configuration.interface';

export * from './receive.stage';
export * from './parse.stage';
export * from './verification.stage';
export * from './dispatch.stage';

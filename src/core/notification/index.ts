export * from './types';
export * from './channels';
export * from './channel-profile';
export * from './wire-codec';
export * from './stages';
export * from './notification-verifier';

export * from './payment-channel.enum';
export * from './wire-format.enum';
export * from './signing-profile.enum';
export * from './sign-algorithm.enum';
export * from './notification-state.enum';
export * from './gateway-error-code.enum';

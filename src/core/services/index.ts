export * from './channel-signing.service';

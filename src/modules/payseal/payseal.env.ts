import { registerAs } from '@nestjs/config';
import { ChannelConfig, ConfigError, KeyMaterial, PaymentChannel, SigningProfile } from '../../core';

const ENV_PREFIX = 'PAYSEAL';

/**
 * Read channel configuration from `PAYSEAL_<CHANNEL>_*` variables.
 *
 * A channel is enabled when any of SECRET, PRIVATE_KEY or PUBLIC_KEY is set.
 * Literal `\n` sequences in key variables are turned into newlines so PEM
 * keys can live on one line.
 */
export function channelConfigsFromEnv(env: NodeJS.ProcessEnv): ChannelConfig[] {
  const configs: ChannelConfig[] = [];

  for (const channel of Object.values(PaymentChannel)) {
    const prefix = `${ENV_PREFIX}_${channel.toUpperCase()}_`;
    const read = (name: string): string | undefined => {
      const value = env[`${prefix}${name}`]?.trim();
      return value ? value : undefined;
    };

    const keys: KeyMaterial = {};
    const secret = read('SECRET');
    const privateKey = read('PRIVATE_KEY');
    const publicKey = read('PUBLIC_KEY');
    if (secret) keys.secret = secret;
    if (privateKey) keys.privateKey = unescapeNewlines(privateKey);
    if (publicKey) keys.publicKey = unescapeNewlines(publicKey);

    if (!keys.secret && !keys.privateKey && !keys.publicKey) {
      continue;
    }

    configs.push({
      channel,
      algorithm: read('ALGORITHM'),
      profile: parseProfile(read('PROFILE'), `${prefix}PROFILE`),
      keys,
    });
  }

  return configs;
}

/**
 * `payseal` configuration namespace for ConfigModule
 */
export const paysealConfig = registerAs('payseal', () => ({
  channels: channelConfigsFromEnv(process.env),
}));

function unescapeNewlines(value: string): string {
  return value.replace(/\\n/g, '\n');
}

function parseProfile(value: string | undefined, variable: string): SigningProfile | undefined {
  if (value === undefined) {
    return undefined;
  }
  const profile = Object.values(SigningProfile).find((candidate) => candidate === value);
  if (!profile) {
    throw new ConfigError(`${variable} must be one of: ${Object.values(SigningProfile).join(', ')}`, [
      `${variable}: ${value}`,
    ]);
  }
  return profile;
}

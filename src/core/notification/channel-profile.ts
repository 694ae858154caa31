import { SigningProfile } from '../domain/enums';
import { ConfigError, InvalidKeyMaterialError } from '../domain/errors';
import { ChannelConfig } from '../interfaces/configuration.interface';
import { Signer } from '../interfaces/signer.interface';
import { resolvePolicy, SigningRules } from '../signing/canonicalization';
import { SignerRegistry } from '../signing/signer-registry';
import { ChannelDefinition, getChannelDefinition } from './channels';

/**
 * A channel's static definition joined with its configured signer
 */
export interface ChannelProfile {
  definition: ChannelDefinition;
  algorithm: string;
  profile: SigningProfile;
  signer: Signer;
  secret?: string;
  notificationExclusions: string[];
}

/**
 * Resolve algorithm, profile and signer for one channel.
 * All key problems surface here, at configuration time.
 */
export function resolveChannelProfile(config: ChannelConfig, registry: SignerRegistry): ChannelProfile {
  const definition = getChannelDefinition(config.channel);
  const algorithm = config.algorithm ?? definition.defaultAlgorithm;
  const profile = config.profile ?? definition.algorithmProfiles[algorithm] ?? definition.defaultProfile;

  if (resolvePolicy(profile).secretPlacement === 'suffix' && !config.keys.secret) {
    throw new InvalidKeyMaterialError(
      `Channel ${config.channel} signs with a shared secret in the string but none is configured`,
      algorithm,
    );
  }

  const signer = registry.get(algorithm, config.keys);

  return {
    definition,
    algorithm,
    profile,
    signer,
    secret: config.keys.secret,
    notificationExclusions: [...definition.notificationExclusions, ...(config.notificationExclusions ?? [])],
  };
}

/**
 * Resolve every configured channel, rejecting duplicates
 */
export function resolveChannelProfiles(configs: ChannelConfig[], registry: SignerRegistry): ChannelProfile[] {
  const seen = new Set<string>();
  return configs.map((config) => {
    if (seen.has(config.channel)) {
      throw new ConfigError(`Channel ${config.channel} is configured more than once`);
    }
    seen.add(config.channel);
    return resolveChannelProfile(config, registry);
  });
}

/**
 * Canonicalization rules for outbound requests or inbound notifications.
 * Notification-only exclusions never apply to outbound signing.
 */
export function signingRulesFor(channel: ChannelProfile, purpose: 'outbound' | 'notification'): SigningRules {
  return {
    profile: channel.profile,
    signatureField: channel.definition.signatureField,
    exclude: purpose === 'notification' ? channel.notificationExclusions : [],
    secret: channel.secret,
  };
}

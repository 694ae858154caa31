import {
  IsArray,
  IsDefined,
  IsEnum,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateNested,
  ValidationError,
  validateSync,
} from 'class-validator';
import { plainToInstance, Type } from 'class-transformer';
import { ChannelConfig, ConfigError, KeyMaterial, PaymentChannel, SigningProfile } from '../../core';

/**
 * Key material for one channel
 */
export class KeyMaterialDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  secret?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  privateKey?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  publicKey?: string;
}

/**
 * DTO for validating per-channel signing configuration
 */
export class ChannelConfigDto {
  @IsEnum(PaymentChannel)
  channel!: PaymentChannel;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  algorithm?: string;

  @IsOptional()
  @IsEnum(SigningProfile)
  profile?: SigningProfile;

  @IsDefined()
  @ValidateNested()
  @Type(() => KeyMaterialDto)
  keys!: KeyMaterialDto;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  notificationExclusions?: string[];
}

/**
 * Validate plain channel configuration (from env, JSON or code).
 *
 * @throws ConfigError listing every violation
 */
export function validateChannelConfigs(plain: unknown): ChannelConfig[] {
  if (!Array.isArray(plain)) {
    throw new ConfigError('PaySeal channels must be an array', ['channels must be an array']);
  }

  const violations: string[] = [];
  const configs: ChannelConfig[] = [];

  plain.forEach((entry: unknown, index) => {
    if (typeof entry !== 'object' || entry === null) {
      violations.push(`channels[${index}] must be an object`);
      return;
    }

    const dto = plainToInstance(ChannelConfigDto, entry);
    const errors = validateSync(dto, { forbidUnknownValues: false });
    if (errors.length > 0) {
      violations.push(...flattenErrors(errors, `channels[${index}]`));
      return;
    }

    if (!dto.keys.secret && !dto.keys.privateKey && !dto.keys.publicKey) {
      violations.push(`channels[${index}].keys must contain a secret, privateKey or publicKey`);
      return;
    }

    configs.push(toChannelConfig(dto));
  });

  if (violations.length > 0) {
    throw new ConfigError(`Invalid PaySeal channel configuration: ${violations.join('; ')}`, violations);
  }
  return configs;
}

function toChannelConfig(dto: ChannelConfigDto): ChannelConfig {
  const keys: KeyMaterial = {};
  if (dto.keys.secret) keys.secret = dto.keys.secret;
  if (dto.keys.privateKey) keys.privateKey = dto.keys.privateKey;
  if (dto.keys.publicKey) keys.publicKey = dto.keys.publicKey;

  return {
    channel: dto.channel,
    algorithm: dto.algorithm,
    profile: dto.profile,
    keys,
    notificationExclusions: dto.notificationExclusions,
  };
}

function flattenErrors(errors: ValidationError[], path: string): string[] {
  return errors.flatMap((error) => {
    const property = `${path}.${error.property}`;
    const own = Object.values(error.constraints ?? {}).map((message) => `${property}: ${message}`);
    return [...own, ...flattenErrors(error.children ?? [], property)];
  });
}

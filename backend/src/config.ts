/**
 * Configuration module - Centralized configuration management
 */

import dotenv from 'dotenv';
import { PublicKey, UInt64 } from 'o1js';
import {
  PlatformConfig,
  DEFAULT_MINIMUM_STAKE,
  DEFAULT_PLATFORM_FEE_BPS,
  MAX_PLATFORM_FEE_BPS,
} from '../../contracts/src/index.js';

// Load environment variables
dotenv.config();

export const config = {
  // Local mode (memory store and escrow, dev deposit route)
  localMode: process.env.LOCAL_MODE === 'true',
  // Server
  port: parseInt(process.env.PORT || '3001'),
  nodeEnv: process.env.NODE_ENV || 'development',

  // Platform roles
  adminAddress: process.env.ADMIN_ADDRESS || '',
  oracleAddress: process.env.ORACLE_ADDRESS || '',
  // Receives the platform fee on every claim (defaults to the admin)
  treasuryAddress: process.env.TREASURY_ADDRESS || '',

  // Platform economics (used only when the store has no config yet)
  minimumStake: process.env.MINIMUM_STAKE || DEFAULT_MINIMUM_STAKE.toString(),
  platformFeeBps: process.env.PLATFORM_FEE_BPS || DEFAULT_PLATFORM_FEE_BPS.toString(),

  // Upstash Redis
  redis: {
    url: process.env.UPSTASH_REDIS_REST_URL || '',
    token: process.env.UPSTASH_REDIS_REST_TOKEN || '',
  },

  // Status Monitor
  monitor: {
    checkInterval: parseInt(process.env.STATUS_CHECK_INTERVAL || '30000'),
  },
};

function isAddress(value: string): boolean {
  try {
    PublicKey.fromBase58(value);
    return true;
  } catch {
    return false;
  }
}

function isUnsignedInteger(value: string): boolean {
  return /^\d+$/.test(value);
}

/**
 * Validate configuration
 */
export function validateConfig(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!config.adminAddress) {
    errors.push('ADMIN_ADDRESS is required');
  } else if (!isAddress(config.adminAddress)) {
    errors.push('ADMIN_ADDRESS is not a valid public key');
  }

  if (!config.oracleAddress) {
    errors.push('ORACLE_ADDRESS is required');
  } else if (!isAddress(config.oracleAddress)) {
    errors.push('ORACLE_ADDRESS is not a valid public key');
  }

  if (config.treasuryAddress && !isAddress(config.treasuryAddress)) {
    errors.push('TREASURY_ADDRESS is not a valid public key');
  }

  if (!isUnsignedInteger(config.minimumStake) || BigInt(config.minimumStake) === 0n) {
    errors.push('MINIMUM_STAKE must be a positive integer');
  }

  if (!isUnsignedInteger(config.platformFeeBps)) {
    errors.push('PLATFORM_FEE_BPS must be an integer');
  } else if (BigInt(config.platformFeeBps) > MAX_PLATFORM_FEE_BPS.toBigInt()) {
    errors.push(`PLATFORM_FEE_BPS must be at most ${MAX_PLATFORM_FEE_BPS.toString()}`);
  }

  if (!config.localMode && (!config.redis.url || !config.redis.token)) {
    errors.push('UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN are required');
  }

  if (!config.treasuryAddress) {
    console.warn('  TREASURY_ADDRESS not set, fees go to the admin');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Platform config used when the store holds none yet
 */
export function getDefaultPlatformConfig(): PlatformConfig {
  const admin = PublicKey.fromBase58(config.adminAddress);
  return new PlatformConfig({
    admin,
    oracle: PublicKey.fromBase58(config.oracleAddress),
    treasury: config.treasuryAddress ? PublicKey.fromBase58(config.treasuryAddress) : admin,
    minimumStake: UInt64.from(config.minimumStake),
    platformFeeBasisPoints: UInt64.from(config.platformFeeBps),
  });
}

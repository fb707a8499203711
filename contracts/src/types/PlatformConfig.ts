/**
 * PlatformConfig.ts - Administrator-controlled platform settings
 *
 * Held by PredictionMarket and persisted by the MarketStore. Only the
 * current admin can change it (see PredictionMarket's admin methods).
 */

import { Struct, UInt64, PublicKey } from 'o1js';

/**
 * @property admin - May create markets and change this config
 * @property oracle - May resolve markets
 * @property treasury - Receives the platform fee on every claim
 * @property minimumStake - Smallest accepted stake (nanounits, > 0)
 * @property platformFeeBasisPoints - Fee on gross winnings (0-1000)
 */
export class PlatformConfig extends Struct({
  admin: PublicKey,
  oracle: PublicKey,
  treasury: PublicKey,
  minimumStake: UInt64,
  platformFeeBasisPoints: UInt64,
}) {
  with(changes: Partial<PlatformConfigFields>): PlatformConfig {
    return new PlatformConfig({
      admin: changes.admin ?? this.admin,
      oracle: changes.oracle ?? this.oracle,
      treasury: changes.treasury ?? this.treasury,
      minimumStake: changes.minimumStake ?? this.minimumStake,
      platformFeeBasisPoints: changes.platformFeeBasisPoints ?? this.platformFeeBasisPoints,
    });
  }
}

export interface PlatformConfigFields {
  admin: PublicKey;
  oracle: PublicKey;
  treasury: PublicKey;
  minimumStake: UInt64;
  platformFeeBasisPoints: UInt64;
}

/**
 * Read access to the live config for the registry, ledger and engine
 */
export interface ConfigSource {
  current(): PlatformConfig;
}

/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { ConfigError } from './lib/error.js';
import { CHAIN_IDS, ChainId, PROTOCOL_IDS, ProtocolId } from './types.js';

interface ChainParams {
  network: string;
  firstHeights: Record<ProtocolId, number>;
}

const CHAIN_PARAMS: Record<ChainId, ChainParams> = {
  BITCOIN: {
    network: 'bitcoin',
    firstHeights: {
      ORDINAL: 767430,
      BRC20: 779832,
    },
  },
  FRACTAL: {
    network: 'fractal',
    firstHeights: {
      ORDINAL: 21000,
      BRC20: 21000,
    },
  },
};

// Indexers on Bitcoin mainnet report their network under either name
const NETWORK_ALIASES: Record<string, string> = {
  mainnet: 'bitcoin',
};

/**
 * First block height at which the protocol produced any receipts on the chain.
 */
export function firstProtocolHeight(
  chain: ChainId,
  protocol: ProtocolId,
): number {
  return CHAIN_PARAMS[chain].firstHeights[protocol];
}

export function chainNetwork(chain: ChainId): string {
  return CHAIN_PARAMS[chain].network;
}

export function normalizeNetwork(network: string): string {
  const lower = network.trim().toLowerCase();
  return NETWORK_ALIASES[lower] ?? lower;
}

function parseEnumValue<T extends string>(
  kind: string,
  choices: readonly T[],
  value: string,
): T {
  const upper = value.trim().toUpperCase();
  const match = choices.find((choice) => choice === upper);
  if (match === undefined) {
    throw new ConfigError(
      `Invalid ${kind}: ${value}. Valid options: ${choices.join(', ')}`,
    );
  }
  return match;
}

export function parseChainId(value: string): ChainId {
  return parseEnumValue('chain', CHAIN_IDS, value);
}

export function parseProtocolId(value: string): ProtocolId {
  return parseEnumValue('protocol', PROTOCOL_IDS, value);
}

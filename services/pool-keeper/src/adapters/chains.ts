// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-keeper/adapters/chains`
 * Purpose: Chain IDs the keeper can run against, mapped to viem chain objects.
 * Side-effects: none
 * @internal
 */

import type { Chain } from "viem";
import { holesky, mainnet, sepolia } from "viem/chains";

const VIEM_CHAINS: ReadonlyMap<number, Chain> = new Map<number, Chain>([
  [mainnet.id, mainnet],
  [holesky.id, holesky],
  [sepolia.id, sepolia],
]);

export const SUPPORTED_CHAIN_IDS: readonly number[] = [...VIEM_CHAINS.keys()];

export function chainFor(chainId: number): Chain {
  const chain = VIEM_CHAINS.get(chainId);
  if (!chain) {
    throw new Error(`Unsupported chainId: ${chainId}`);
  }
  return chain;
}

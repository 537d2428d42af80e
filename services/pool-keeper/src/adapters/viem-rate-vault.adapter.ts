// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-keeper/adapters/viem-rate-vault`
 * Purpose: RateVault backed by an on-chain shares token via viem.
 * Scope: Conversion reads and share transfers signed by the operator account. Does not hold ledger state.
 * Invariants:
 * - Transfers are simulated first; a simulated revert returns 0n (the ledger reports the failure).
 * - A mined but reverted transaction returns 0n.
 * - Transport and RPC errors propagate unchanged.
 * Side-effects: IO (RPC reads, signed transactions)
 * Links: packages/pool-core/src/vault.ts
 * @public
 */

import type { ParticipantAddress } from "@stakepool/ids";
import type { RateVault } from "@stakepool/pool-core";
import {
  type Account,
  type Address,
  BaseError,
  type Chain,
  ContractFunctionRevertedError,
  type Hash,
  type PublicClient,
  type Transport,
  type WalletClient,
} from "viem";

import type { Logger } from "../observability/logger.js";
import { SHARES_TOKEN_ABI } from "./shares-token.abi.js";

export interface ViemRateVaultConfig {
  readonly publicClient: PublicClient<Transport, Chain>;
  readonly walletClient: WalletClient<Transport, Chain, Account>;
  readonly token: Address;
  readonly logger: Logger;
}

function isRevert(error: unknown): boolean {
  return (
    error instanceof BaseError &&
    error.walk((cause) => cause instanceof ContractFunctionRevertedError) !==
      null
  );
}

export class ViemRateVault implements RateVault {
  private readonly publicClient: PublicClient<Transport, Chain>;
  private readonly walletClient: WalletClient<Transport, Chain, Account>;
  private readonly token: Address;
  private readonly log: Logger;

  constructor(config: ViemRateVaultConfig) {
    this.publicClient = config.publicClient;
    this.walletClient = config.walletClient;
    this.token = config.token;
    this.log = config.logger;
  }

  async value(shares: bigint): Promise<bigint> {
    return this.publicClient.readContract({
      address: this.token,
      abi: SHARES_TOKEN_ABI,
      functionName: "getPooledEthByShares",
      args: [shares],
    });
  }

  async shares(value: bigint): Promise<bigint> {
    return this.publicClient.readContract({
      address: this.token,
      abi: SHARES_TOKEN_ABI,
      functionName: "getSharesByPooledEth",
      args: [value],
    });
  }

  async transferShares(
    to: ParticipantAddress,
    shares: bigint
  ): Promise<bigint> {
    let hash: Hash;
    try {
      const { request } = await this.publicClient.simulateContract({
        account: this.walletClient.account,
        address: this.token,
        abi: SHARES_TOKEN_ABI,
        functionName: "transferShares",
        args: [to, shares],
      });
      hash = await this.walletClient.writeContract(request);
    } catch (error) {
      if (!isRevert(error)) throw error;
      this.log.warn(
        { to, shares: shares.toString(), err: error },
        "transferShares simulation reverted"
      );
      return 0n;
    }
    return this.settle(hash, shares, "transferShares");
  }

  async transferSharesFrom(
    from: ParticipantAddress,
    to: ParticipantAddress,
    shares: bigint
  ): Promise<bigint> {
    let hash: Hash;
    try {
      const { request } = await this.publicClient.simulateContract({
        account: this.walletClient.account,
        address: this.token,
        abi: SHARES_TOKEN_ABI,
        functionName: "transferSharesFrom",
        args: [from, to, shares],
      });
      hash = await this.walletClient.writeContract(request);
    } catch (error) {
      if (!isRevert(error)) throw error;
      this.log.warn(
        { from, to, shares: shares.toString(), err: error },
        "transferSharesFrom simulation reverted"
      );
      return 0n;
    }
    return this.settle(hash, shares, "transferSharesFrom");
  }

  private async settle(
    hash: Hash,
    shares: bigint,
    operation: string
  ): Promise<bigint> {
    const receipt = await this.publicClient.waitForTransactionReceipt({
      hash,
    });
    if (receipt.status !== "success") {
      this.log.warn({ hash, operation }, "share transfer reverted on-chain");
      return 0n;
    }
    this.log.info(
      {
        hash,
        operation,
        shares: shares.toString(),
        blockNumber: receipt.blockNumber.toString(),
      },
      "share transfer confirmed"
    );
    return shares;
  }
}

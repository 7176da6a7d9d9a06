/**
 * Chain Read Service
 *
 * Native and ERC-20 reads executed through the failover executor, so a
 * dead primary falls through to the backups and the one that answers is
 * promoted.
 */

import { formatUnits, type Address } from 'viem';
import { createViemChainReader, type ChainReaderFactory } from '../adapters/ViemChainReader';
import type { FailoverExecutor } from '../rpc/FailoverExecutor';
import { RailError, ValidationError } from '../utils/errors';
import { Validators } from '../utils/validators';
import {
  DEFAULT_ATTEMPT_TIMEOUT_MS,
  failure,
  mapResult,
  success,
  type RailResult,
} from '../rpc/types';

const NATIVE_DECIMALS = 18;

export interface NativeBalance {
  chainId: number;
  /** Checksummed */
  address: Address;
  wei: bigint;
  formatted: string;
  endpoint: string;
}

export interface TokenBalance {
  chainId: number;
  token: Address;
  owner: Address;
  raw: bigint;
  decimals: number;
  formatted: string;
  endpoint: string;
}

export interface TokenInfo {
  chainId: number;
  token: Address;
  name: string;
  symbol: string;
  decimals: number;
  totalSupply: bigint;
  endpoint: string;
}

export interface ChainReadServiceOptions {
  executor: Pick<FailoverExecutor, 'execute'>;
  readerFactory?: ChainReaderFactory;
  /** Passed to each reader's transport; should match the executor's attempt timeout */
  attemptTimeoutMs?: number;
}

export class ChainReadService {
  private executor: Pick<FailoverExecutor, 'execute'>;
  private readerFactory: ChainReaderFactory;
  private attemptTimeoutMs: number;

  constructor(options: ChainReadServiceOptions) {
    this.executor = options.executor;
    this.readerFactory = options.readerFactory ?? createViemChainReader;
    this.attemptTimeoutMs = options.attemptTimeoutMs ?? DEFAULT_ATTEMPT_TIMEOUT_MS;
  }

  async getNativeBalance(chainId: number, address: string): Promise<RailResult<NativeBalance>> {
    const parsed = checkAddress(chainId, address);
    if (!parsed.ok) return parsed;
    const owner = parsed.value;

    const result = await this.executor.execute(
      chainId,
      (url, signal) => this.readerFactory(url, this.attemptTimeoutMs, signal).getNativeBalance(owner),
      { operationName: 'eth_getBalance' }
    );

    return mapResult(result, ({ value, endpoint }) => ({
      chainId,
      address: owner,
      wei: value,
      formatted: formatUnits(value, NATIVE_DECIMALS),
      endpoint,
    }));
  }

  async getTokenBalance(chainId: number, token: string, owner: string): Promise<RailResult<TokenBalance>> {
    const parsedToken = checkAddress(chainId, token);
    if (!parsedToken.ok) return parsedToken;
    const parsedOwner = checkAddress(chainId, owner);
    if (!parsedOwner.ok) return parsedOwner;
    const tokenAddress = parsedToken.value;
    const ownerAddress = parsedOwner.value;

    const result = await this.executor.execute(
      chainId,
      (url, signal) =>
        this.readerFactory(url, this.attemptTimeoutMs, signal).getTokenBalance(tokenAddress, ownerAddress),
      { operationName: 'erc20.balanceOf' }
    );

    return mapResult(result, ({ value, endpoint }) => ({
      chainId,
      token: tokenAddress,
      owner: ownerAddress,
      raw: value.raw,
      decimals: value.decimals,
      formatted: formatUnits(value.raw, value.decimals),
      endpoint,
    }));
  }

  async getTokenInfo(chainId: number, token: string): Promise<RailResult<TokenInfo>> {
    const parsed = checkAddress(chainId, token);
    if (!parsed.ok) return parsed;
    const address = parsed.value;

    const result = await this.executor.execute(
      chainId,
      (url, signal) => this.readerFactory(url, this.attemptTimeoutMs, signal).getTokenMetadata(address),
      { operationName: 'erc20.metadata' }
    );

    return mapResult(result, ({ value, endpoint }) => ({
      chainId,
      token: address,
      ...value,
      endpoint,
    }));
  }
}

function checkAddress(chainId: number, address: string): RailResult<Address> {
  try {
    return success(Validators.validateAddress(address));
  } catch (err) {
    if (err instanceof ValidationError) {
      return failure(RailError.invalidInput(err, chainId));
    }
    throw err;
  }
}

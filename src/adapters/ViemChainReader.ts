import {
  createPublicClient,
  http,
  parseAbi,
  type Address,
  type PublicClient,
} from 'viem';

// ERC20 ABI for token reads
const ERC20_ABI = parseAbi([
  'function balanceOf(address account) view returns (uint256)',
  'function decimals() view returns (uint8)',
  'function symbol() view returns (string)',
  'function name() view returns (string)',
  'function totalSupply() view returns (uint256)',
]);

export interface TokenBalanceReading {
  raw: bigint;
  decimals: number;
}

export interface TokenMetadata {
  name: string;
  symbol: string;
  decimals: number;
  totalSupply: bigint;
}

/**
 * Reads chain state from a single endpoint
 */
export interface ChainReader {
  getNativeBalance(address: Address): Promise<bigint>;
  getTokenBalance(token: Address, owner: Address): Promise<TokenBalanceReading>;
  getTokenMetadata(token: Address): Promise<TokenMetadata>;
}

/**
 * Builds a reader bound to one endpoint for one failover attempt
 */
export type ChainReaderFactory = (url: string, timeoutMs: number, signal: AbortSignal) => ChainReader;

/**
 * ChainReader over a viem public client with a single HTTP transport.
 * Retries are off; failover between endpoints happens one level up.
 */
export class ViemChainReader implements ChainReader {
  private client: PublicClient;

  constructor(url: string, timeoutMs: number, signal: AbortSignal) {
    this.client = createPublicClient({
      transport: http(url, { timeout: timeoutMs, retryCount: 0, fetchOptions: { signal } }),
    });
  }

  async getNativeBalance(address: Address): Promise<bigint> {
    return this.client.getBalance({ address });
  }

  async getTokenBalance(token: Address, owner: Address): Promise<TokenBalanceReading> {
    const [raw, decimals] = await Promise.all([
      this.client.readContract({
        address: token,
        abi: ERC20_ABI,
        functionName: 'balanceOf',
        args: [owner],
      }),
      this.client.readContract({
        address: token,
        abi: ERC20_ABI,
        functionName: 'decimals',
      }),
    ]);
    return { raw, decimals };
  }

  async getTokenMetadata(token: Address): Promise<TokenMetadata> {
    const [name, symbol, decimals, totalSupply] = await Promise.all([
      this.client.readContract({ address: token, abi: ERC20_ABI, functionName: 'name' }),
      this.client.readContract({ address: token, abi: ERC20_ABI, functionName: 'symbol' }),
      this.client.readContract({ address: token, abi: ERC20_ABI, functionName: 'decimals' }),
      this.client.readContract({ address: token, abi: ERC20_ABI, functionName: 'totalSupply' }),
    ]);
    return { name, symbol, decimals, totalSupply };
  }
}

export const createViemChainReader: ChainReaderFactory = (url, timeoutMs, signal) =>
  new ViemChainReader(url, timeoutMs, signal);

import { getAddress, isAddress, type Address } from 'viem';
import { ValidationError } from './errors';

const PLACEHOLDER_PATTERN = /\$\{[^}]*\}/;

/**
 * Input validation utilities
 */
export class Validators {
  /**
   * Validates a chain ID: positive safe integer
   * @throws ValidationError if invalid
   */
  static validateChainId(chainId: number): void {
    if (!Number.isSafeInteger(chainId) || chainId <= 0) {
      throw ValidationError.invalidChainId(chainId);
    }
  }

  /**
   * Validates and normalises an RPC URL (http or https only)
   * @returns The trimmed URL
   * @throws ValidationError if invalid
   */
  static validateRpcUrl(url: string): string {
    const trimmed = typeof url === 'string' ? url.trim() : '';
    if (!trimmed || PLACEHOLDER_PATTERN.test(trimmed)) {
      throw ValidationError.invalidUrl(Validators.maskUrl(trimmed));
    }

    let parsed: URL;
    try {
      parsed = new URL(trimmed);
    } catch {
      throw ValidationError.invalidUrl(Validators.maskUrl(trimmed));
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw ValidationError.invalidUrl(Validators.maskUrl(trimmed));
    }

    return trimmed;
  }

  /**
   * Whether a directory URL can be probed: http(s) with no `${...}` placeholder
   */
  static isUsableRpcUrl(url: string): boolean {
    try {
      Validators.validateRpcUrl(url);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Validates an EVM address in any letter case
   * @returns EIP-55 checksummed address
   * @throws ValidationError if invalid
   */
  static validateAddress(address: string): Address {
    if (!address || !isAddress(address, { strict: false })) {
      throw ValidationError.invalidAddress(Validators.maskAddress(address ?? ''));
    }
    return getAddress(address);
  }

  /**
   * Masks an RPC URL for logs and messages; paths and query strings often carry API keys
   */
  static maskUrl(url: string): string {
    try {
      const parsed = new URL(url);
      const hasPath = parsed.pathname.length > 1 || parsed.search.length > 0;
      return `${parsed.protocol}//${parsed.host}${hasPath ? '/***' : ''}`;
    } catch {
      return '***';
    }
  }

  /**
   * Masks an address for display in errors
   */
  static maskAddress(address: string): string {
    if (address.length < 10) {
      return '***';
    }
    return `${address.slice(0, 6)}...${address.slice(-4)}`;
  }
}

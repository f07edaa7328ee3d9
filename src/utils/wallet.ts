import { Keypair, PublicKey, VersionedTransaction, type Signer } from '@solana/web3.js';
import bs58 from 'bs58';
import { createLogger } from './logger';
import { WalletError, errorMessage } from './errors';
import type { RpcPool } from './rpc';

const log = createLogger('wallet');

export const LAMPORTS_PER_SOL = 1_000_000_000;

export interface BalanceProvider {
  getBalance(address: PublicKey): Promise<number>;
}

export function rpcBalanceProvider<C extends BalanceProvider>(pool: RpcPool<C>): BalanceProvider {
  return {
    getBalance: (address) => pool.run(conn => conn.getBalance(address), 'getBalance'),
  };
}

export type ConnectResult =
  | { success: true; address: string }
  | { success: false; reason: string };

export interface BalanceReading {
  lamports: number;
  sol: number;
  error?: 'wallet-not-connected' | 'balance-unavailable';
}

export interface WalletSnapshot {
  publicAddress: string | null;
  connected: boolean;
  balanceLamports: number;
}

// Accepts a base58 secret key (64 bytes), a 32-byte base58 seed, or a JSON byte array
export function decodeSecretKey(material: string): Uint8Array {
  const trimmed = material.trim();
  if (!trimmed) throw new WalletError('invalid-key', 'Private key material is empty');

  let bytes: Uint8Array;
  try {
    if (trimmed.startsWith('[')) {
      const parsed: unknown = JSON.parse(trimmed);
      if (!Array.isArray(parsed) || !parsed.every(n => Number.isInteger(n) && n >= 0 && n <= 255)) {
        throw new Error('expected an array of bytes');
      }
      bytes = Uint8Array.from(parsed);
    } else {
      bytes = bs58.decode(trimmed);
    }
  } catch (err) {
    throw new WalletError('invalid-key', `Malformed private key: ${errorMessage(err)}`);
  }

  try {
    if (bytes.length === 32) return Keypair.fromSeed(bytes).secretKey;
    if (bytes.length === 64) {
      Keypair.fromSecretKey(bytes); // validates the embedded public key
      return bytes;
    }
  } catch (err) {
    throw new WalletError('invalid-key', `Malformed private key: ${errorMessage(err)}`);
  }
  throw new WalletError('invalid-key', `Private key must be 32 or 64 bytes, got ${bytes.length}`);
}

/**
 * Connection status, public address and the in-memory signing credential.
 * `sign` is the only code path that reads the secret; `disconnect` zero-fills it
 * synchronously so any later signing attempt fails fast.
 */
export class WalletState {
  private secret: Uint8Array | null = null;
  private publicKey: PublicKey | null = null;
  private balanceLamports = 0;
  private sessionId = 0;

  constructor(private readonly balances: BalanceProvider) {}

  get connected(): boolean {
    return this.secret !== null;
  }

  get publicAddress(): string | null {
    return this.publicKey ? this.publicKey.toBase58() : null;
  }

  /** Bumps on every connect/disconnect so in-flight work can detect a change of wallet. */
  get session(): number {
    return this.sessionId;
  }

  snapshot(): WalletSnapshot {
    return {
      publicAddress: this.publicAddress,
      connected: this.connected,
      balanceLamports: this.balanceLamports,
    };
  }

  connect(material: string | undefined | null): ConnectResult {
    let secret: Uint8Array;
    try {
      if (!material) throw new WalletError('invalid-key', 'No private key provided');
      secret = decodeSecretKey(material);
    } catch (err) {
      const reason = errorMessage(err);
      log.error('Wallet connect failed', { reason });
      return { success: false, reason };
    }

    if (this.secret) this.purge();

    this.secret = secret;
    this.publicKey = new PublicKey(secret.slice(32, 64));
    this.sessionId++;
    const address = this.publicKey.toBase58();
    log.info('Wallet connected', { publicKey: address });
    return { success: true, address };
  }

  connectEphemeral(): ConnectResult {
    const result = this.connect(bs58.encode(Keypair.generate().secretKey));
    if (result.success) log.info('Paper mode: using ephemeral wallet', { publicKey: result.address });
    return result;
  }

  disconnect(): { success: true } {
    if (this.secret) {
      this.purge();
      this.sessionId++;
      log.info('Wallet disconnected');
    }
    return { success: true };
  }

  private purge() {
    this.secret?.fill(0);
    this.secret = null;
    this.publicKey = null;
    this.balanceLamports = 0;
  }

  async balance(): Promise<BalanceReading> {
    const publicKey = this.publicKey;
    if (!publicKey) return { lamports: 0, sol: 0, error: 'wallet-not-connected' };

    const session = this.sessionId;
    try {
      const lamports = await this.balances.getBalance(publicKey);
      // Disconnected while the query was in flight
      if (session !== this.sessionId) return { lamports: 0, sol: 0, error: 'wallet-not-connected' };
      this.balanceLamports = lamports;
      return { lamports, sol: lamports / LAMPORTS_PER_SOL };
    } catch (err) {
      log.warn('Balance query failed', { error: errorMessage(err) });
      return { lamports: 0, sol: 0, error: 'balance-unavailable' };
    }
  }

  requireAddress(): PublicKey {
    if (!this.publicKey) throw new WalletError('wallet-not-connected', 'Wallet not connected');
    return this.publicKey;
  }

  /** Signs serialized versioned-transaction bytes and returns the signed bytes. */
  sign(rawTransaction: Uint8Array): Uint8Array {
    if (!this.secret || !this.publicKey) {
      throw new WalletError('no-credential', 'No signing credential: wallet disconnected');
    }
    const signer: Signer = { publicKey: this.publicKey, secretKey: this.secret };
    try {
      const tx = VersionedTransaction.deserialize(rawTransaction);
      tx.sign([signer]);
      return tx.serialize();
    } catch (err) {
      throw new WalletError('sign-rejected', `Signing rejected: ${errorMessage(err)}`);
    }
  }
}

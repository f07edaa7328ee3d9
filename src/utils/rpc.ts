import { Connection } from '@solana/web3.js';
import { createLogger, redactUrl } from './logger';
import { errorMessage } from './errors';
import { backoffMs, sleep } from './timing';

const log = createLogger('rpc');

export interface RpcPoolOptions {
  endpoints: string[];
  maxAttemptsPerEndpoint: number;
  backoffMs: number;
}

export type ConnectionFactory<C> = (endpoint: string) => C;

const defaultFactory: ConnectionFactory<Connection> = (endpoint) =>
  new Connection(endpoint, { commitment: 'confirmed' });

/**
 * Ordered list of RPC endpoints with a single "try each until success" policy.
 * Connections are created lazily, one per endpoint, and reused.
 */
export class RpcPool<C = Connection> {
  private readonly connections = new Map<string, C>();
  private preferred = 0;

  constructor(
    private readonly options: RpcPoolOptions,
    private readonly factory: ConnectionFactory<C>,
  ) {
    if (options.endpoints.length === 0) {
      throw new Error('RpcPool needs at least one endpoint');
    }
  }

  static create(options: RpcPoolOptions): RpcPool<Connection> {
    return new RpcPool(options, defaultFactory);
  }

  get endpoints(): readonly string[] {
    return this.options.endpoints;
  }

  private connectionFor(endpoint: string): C {
    let conn = this.connections.get(endpoint);
    if (!conn) {
      conn = this.factory(endpoint);
      this.connections.set(endpoint, conn);
      log.info('RPC connection initialized', { rpc: redactUrl(endpoint) });
    }
    return conn;
  }

  /**
   * Run `op` against the last endpoint that worked, then the rest in order.
   * Each endpoint gets `maxAttemptsPerEndpoint` tries with backoff between them.
   */
  async run<T>(op: (conn: C) => Promise<T>, label: string): Promise<T> {
    const { endpoints, maxAttemptsPerEndpoint } = this.options;
    let lastError: unknown = new Error(`${label}: no endpoint tried`);

    for (let i = 0; i < endpoints.length; i++) {
      const idx = (this.preferred + i) % endpoints.length;
      const endpoint = endpoints[idx];
      for (let attempt = 0; attempt < maxAttemptsPerEndpoint; attempt++) {
        try {
          const result = await op(this.connectionFor(endpoint));
          this.preferred = idx;
          return result;
        } catch (err) {
          lastError = err;
          log.warn('RPC call failed', {
            label,
            rpc: redactUrl(endpoint),
            attempt: attempt + 1,
            error: errorMessage(err),
          });
          if (attempt < maxAttemptsPerEndpoint - 1) {
            await sleep(backoffMs(attempt, this.options.backoffMs));
          }
        }
      }
    }

    throw lastError;
  }
}

import type { Logger } from 'pino';
import { DocumentStoreError } from '../../domain/index.js';
import { createDbClient } from './client.js';
import type { Database, DbClient } from './client.js';
import { Semaphore } from './semaphore.js';
import { toStoreError } from './errors.js';
import type { InvalidInputKind } from './errors.js';

export interface PoolConfig {
  databaseUrl: string;
  poolSize: number;
  /** Longest wait for a free connection before failing with StoreUnavailable. */
  acquireTimeoutMs: number;
  /**
   * Default and upper bound of the per-call timeout. Installed as the
   * server's statement_timeout, so no call can outlive it.
   */
  queryTimeoutMs: number;
  idleTimeoutSeconds: number;
  connectTimeoutSeconds: number;
}

export interface RunOptions {
  /** Shortens the timeout for this call; values above `queryTimeoutMs` are capped to it. */
  timeoutMs?: number;
  /** Label for logs. */
  operation?: string;
  /** Kind reported when the server rejects a value (SQLSTATE class 22). Defaults to InvalidDocument. */
  invalidInputKind?: InvalidInputKind;
}

/**
 * Anything that can run one unit of store work. The use cases depend on
 * this rather than on the pool so they can be exercised without a server.
 */
export interface QueryRunner {
  readonly log: Logger;
  run<T>(work: (db: Database) => Promise<T>, options?: RunOptions): Promise<T>;
}

const TIMED_OUT = Symbol('timed out');

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Process-scoped pool of store connections.
 *
 * postgres.js owns the sockets; a semaphore of the same size gates callers
 * so acquisition can time out instead of queueing forever. A permit is held
 * until the statement settles, even when the caller has already given up on
 * it, so the pool never hands out more work than it has connections for.
 */
export class ConnectionPool implements QueryRunner {
  private readonly permits: Semaphore;
  private drained: Promise<void> | null = null;

  constructor(
    private readonly config: PoolConfig,
    public readonly log: Logger,
    private readonly client: DbClient = createDbClient({
      databaseUrl: config.databaseUrl,
      poolSize: config.poolSize,
      idleTimeoutSeconds: config.idleTimeoutSeconds,
      connectTimeoutSeconds: config.connectTimeoutSeconds,
      statementTimeoutMs: config.queryTimeoutMs,
    }),
  ) {
    this.permits = new Semaphore(config.poolSize);
  }

  get stats(): { size: number; inUse: number; waiting: number } {
    return { size: this.config.poolSize, inUse: this.permits.inUse, waiting: this.permits.waiting };
  }

  async run<T>(work: (db: Database) => Promise<T>, options: RunOptions = {}): Promise<T> {
    const operation = options.operation ?? 'query';

    if (this.drained !== null) {
      throw new DocumentStoreError('StoreUnavailable', 'Connection pool has been drained');
    }

    const release = await this.permits.acquire(this.config.acquireTimeoutMs);
    if (release === null) {
      this.log.warn({ operation, acquireTimeoutMs: this.config.acquireTimeoutMs, ...this.stats }, 'Connection pool exhausted');
      throw new DocumentStoreError(
        'StoreUnavailable',
        `No connection available within ${this.config.acquireTimeoutMs}ms`,
      );
    }

    const started = Date.now();
    let pending: Promise<T>;
    try {
      pending = work(this.client.db);
    } catch (err: unknown) {
      release();
      throw toStoreError(err, options.invalidInputKind);
    }

    const outcome: Promise<Outcome<T>> = pending
      .then(
        (value): Outcome<T> => ({ ok: true, value }),
        (error: unknown): Outcome<T> => ({ ok: false, error }),
      )
      .finally(release);

    const timeoutMs = this.callTimeout(operation, options.timeoutMs);
    const result = await raceTimeout(outcome, timeoutMs);

    if (result === TIMED_OUT) {
      this.log.error({ operation, timeoutMs }, 'Store call timed out');
      throw new DocumentStoreError('StoreUnavailable', `${operation} exceeded ${timeoutMs}ms`);
    }

    if (!result.ok) {
      const storeError = toStoreError(result.error, options.invalidInputKind);
      if (storeError.kind === 'StoreUnavailable') {
        this.log.error({ operation, err: result.error }, 'Store unavailable');
      }
      throw storeError;
    }

    this.log.debug({ operation, durationMs: Date.now() - started }, 'Store call completed');
    return result.value;
  }

  /** Caller timeouts are capped at `queryTimeoutMs`, the server's statement_timeout. */
  private callTimeout(operation: string, requested: number | undefined): number {
    const ceiling = this.config.queryTimeoutMs;
    if (requested === undefined) return ceiling;
    if (requested > ceiling) {
      this.log.debug({ operation, requestedMs: requested, timeoutMs: ceiling }, 'Call timeout capped to the statement timeout');
      return ceiling;
    }
    return requested;
  }

  /**
   * Stops accepting work, waits for in-flight calls and closes every
   * connection. Safe to call more than once.
   */
  drain(): Promise<void> {
    if (this.drained === null) {
      this.drained = this.permits.idle()
        .then(() => this.client.sql.end({ timeout: 5 }))
        .then(() => {
          this.log.info('Connection pool drained');
        });
    }
    return this.drained;
  }
}

function raceTimeout<T>(promise: Promise<T>, ms: number): Promise<T | typeof TIMED_OUT> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), ms);
  });
  return Promise.race([promise, expiry]).finally(() => clearTimeout(timer));
}

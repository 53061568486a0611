import { nowSeconds } from '../claims';
import { Clock, VerifiedToken } from '../types';
import {
  Blocklist,
  BlocklistOptions,
  DEFAULT_REVOCATION_TTL,
  DEFAULT_SHARD_COUNT,
  DEFAULT_SWEEP_INTERVAL,
  tokenIdentifier,
} from './blocklist';

/**
 * In-memory revocation store.
 *
 * Entries are spread over `shards` maps keyed by identifier hash. The sweep
 * job visits one shard per tick, so a full pass takes `sweepInterval` and
 * no single tick touches more than one partition. Expired entries are also
 * dropped lazily when looked up.
 *
 * Everything lives in process memory; revocations do not survive a restart
 * and are not shared between instances.
 *
 * @example
 * ```typescript
 * const blocklist = new InMemoryBlocklist({ sweepInterval: 30_000 });
 * blocklist.start();
 *
 * const result = verifyToken({ token, key, blocklist });
 * if (result.valid) {
 *   blocklist.invalidateToken(result.token); // logout
 * }
 *
 * // on shutdown
 * blocklist.stop();
 * ```
 */
export class InMemoryBlocklist implements Blocklist {
  private readonly shards: Map<string, number>[];
  private readonly sweepInterval: number;
  private readonly clock: Clock;
  private readonly defaultTtl: number;
  private readonly identifyToken: (token: VerifiedToken) => string;
  private readonly onSweep?: (removed: number) => void;
  private timer: NodeJS.Timeout | null = null;
  private cursor = 0;

  constructor(options: BlocklistOptions = {}) {
    const shardCount = Math.max(1, Math.floor(options.shards ?? DEFAULT_SHARD_COUNT));
    this.shards = Array.from({ length: shardCount }, () => new Map<string, number>());
    this.sweepInterval = options.sweepInterval ?? DEFAULT_SWEEP_INTERVAL;
    this.clock = options.clock ?? Date.now;
    this.defaultTtl = options.defaultTtl ?? DEFAULT_REVOCATION_TTL;
    this.identifyToken = options.identify ?? tokenIdentifier;
    this.onSweep = options.onSweep;
  }

  // ==========================================================================
  // REVOCATION CHECKER
  // ==========================================================================

  identify(token: VerifiedToken): string {
    return this.identifyToken(token);
  }

  isBlocked(id: string): boolean {
    const shard = this.shardFor(id);
    const expiry = shard.get(id);
    if (expiry === undefined) return false;
    if (expiry <= nowSeconds(this.clock)) {
      shard.delete(id);
      return false;
    }
    return true;
  }

  // ==========================================================================
  // MUTATIONS
  // ==========================================================================

  invalidate(id: string, expiry: number): void {
    this.shardFor(id).set(id, expiry);
  }

  invalidateToken(token: VerifiedToken): string {
    const id = this.identify(token);
    const expiry = token.claims.exp ?? nowSeconds(this.clock) + this.defaultTtl;
    this.invalidate(id, expiry);
    return id;
  }

  remove(id: string): boolean {
    return this.shardFor(id).delete(id);
  }

  count(): number {
    return this.shards.reduce((total, shard) => total + shard.size, 0);
  }

  // ==========================================================================
  // SWEEPING
  // ==========================================================================

  /**
   * Full pass over every shard.
   */
  sweep(): number {
    const now = nowSeconds(this.clock);
    const removed = this.shards.reduce((total, shard) => total + this.sweepShard(shard, now), 0);
    this.onSweep?.(removed);
    return removed;
  }

  /**
   * Start the background sweep. Calling it while running does nothing.
   */
  start(): void {
    if (this.timer) return;

    const tickInterval = Math.max(1, Math.floor(this.sweepInterval / this.shards.length));
    this.timer = setInterval(() => this.tick(), tickInterval);
    // Never keep the process alive just for sweeping
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  private tick(): void {
    const shard = this.shards[this.cursor];
    this.cursor = (this.cursor + 1) % this.shards.length;
    const removed = this.sweepShard(shard, nowSeconds(this.clock));
    this.onSweep?.(removed);
  }

  private sweepShard(shard: Map<string, number>, now: number): number {
    let removed = 0;
    for (const [id, expiry] of shard) {
      if (expiry <= now) {
        shard.delete(id);
        removed++;
      }
    }
    return removed;
  }

  // FNV-1a over UTF-16 code units
  private shardFor(id: string): Map<string, number> {
    let hash = 0x811c9dc5;
    for (let i = 0; i < id.length; i++) {
      hash ^= id.charCodeAt(i);
      hash = Math.imul(hash, 0x01000193);
    }
    return this.shards[(hash >>> 0) % this.shards.length];
  }
}

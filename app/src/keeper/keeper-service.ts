/**
 * Keeper service - pokes TWAP observations on a schedule
 */

import { EventEmitter } from 'events';
import { PairId, ProtocolError } from '../types';
import { HEARTBEAT_MS, TICK_MS } from '../config/constants';
import { colors } from '../config/colors';
import { Clock } from '../utils/clock';
import { Logger } from '../utils/logger';
import { formatDuration, formatTimestamp } from '../utils/formatting';
import { TimeWeightedPriceOracle } from '../oracles/twap-oracle';
import { HealthReport, buildHealthReport } from './health';

export interface KeeperServiceConfig {
  oracle: TimeWeightedPriceOracle;
  clock: Clock;
  logger: Logger;
  /** Pairs to poke; defaults to every registered pair */
  pairs?: PairId[];
  tickMs?: number;
  heartbeatMs?: number;
  /** Runs before each poke round (e.g. syncing simulated pools) */
  beforeTick?: () => void;
}

export type PokeOutcome =
  | { pair: PairId; status: 'recorded'; timestamp: number }
  | { pair: PairId; status: 'skipped' }
  | { pair: PairId; status: 'failed'; error: string };

/**
 * Emits 'observation' (pair, timestamp), 'pokeFailed' (pair, error) and 'tick' (HealthReport)
 */
export class KeeperService extends EventEmitter {
  private config: KeeperServiceConfig;
  private logger: Logger;
  private updateInterval: NodeJS.Timeout | null = null;
  private heartbeatInterval: NodeJS.Timeout | null = null;
  private pokeCount: number = 0;
  private errorCount: number = 0;
  private startedAt: number | null = null;

  constructor(config: KeeperServiceConfig) {
    super();
    this.config = config;
    this.logger = config.logger;
  }

  pairs(): PairId[] {
    return this.config.pairs ?? this.config.oracle.registeredPairs();
  }

  /**
   * One poke round over every pair; a failing pair does not stop the others
   */
  tick(): PokeOutcome[] {
    this.config.beforeTick?.();
    const outcomes = this.pairs().map((pair) => this.poke(pair));
    this.emit('tick', this.healthReport());
    return outcomes;
  }

  healthReport(): HealthReport {
    return buildHealthReport(this.config.oracle, this.pairs(), this.config.clock);
  }

  getStats(): { pokes: number; errors: number } {
    return { pokes: this.pokeCount, errors: this.errorCount };
  }

  private poke(pair: PairId): PokeOutcome {
    try {
      if (!this.config.oracle.recordObservationIfDue(pair)) {
        return { pair, status: 'skipped' };
      }
      this.pokeCount++;
      const timestamp = this.config.clock.now();
      this.logger.verboseLog(`${colors.green}✓${colors.reset} observation recorded for ${pair} at ${formatTimestamp(timestamp)}`);
      this.emit('observation', pair, timestamp);
      return { pair, status: 'recorded', timestamp };
    } catch (error) {
      if (!(error instanceof ProtocolError)) {
        throw error;
      }
      this.errorCount++;
      this.logger.error(`[poke ${pair}]`, error.message);
      this.emit('pokeFailed', pair, error);
      return { pair, status: 'failed', error: error.message };
    }
  }

  private logHeartbeat(): void {
    const memUsage = process.memoryUsage();
    const heapUsedMB = (memUsage.heapUsed / 1024 / 1024).toFixed(2);
    const uptime = this.startedAt === null ? 0 : (Date.now() - this.startedAt) / 1000;
    const ready = this.healthReport().pairs.filter((p) => p.ready).length;

    this.logger.info(
      `${colors.gray}[HEARTBEAT] ${new Date().toISOString()} | PID: ${process.pid} | ` +
      `Uptime: ${formatDuration(uptime)} | Pokes: ${this.pokeCount} | Errors: ${this.errorCount} | ` +
      `Ready: ${ready}/${this.pairs().length} | Heap: ${heapUsedMB} MB${colors.reset}`
    );
  }

  /**
   * Start the poke loop and heartbeat
   */
  start(): void {
    if (this.updateInterval) {
      return;
    }
    this.startedAt = Date.now();
    this.tickSafely();
    this.updateInterval = setInterval(() => this.tickSafely(), this.config.tickMs ?? TICK_MS);
    this.heartbeatInterval = setInterval(() => this.logHeartbeat(), this.config.heartbeatMs ?? HEARTBEAT_MS);
    this.logHeartbeat();
  }

  stop(): void {
    if (this.updateInterval) {
      clearInterval(this.updateInterval);
      this.updateInterval = null;
    }
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }
    this.emit('stopped');
  }

  private tickSafely(): void {
    try {
      this.tick();
    } catch (error) {
      this.errorCount++;
      this.logger.error('[keeper/tick]', error instanceof Error ? error.message : String(error));
    }
  }
}

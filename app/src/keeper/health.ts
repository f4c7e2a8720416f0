/**
 * Readiness report per trading pair
 */

import { PairId } from '../types';
import { Clock } from '../utils/clock';
import { colorize, readinessBadge } from '../config/colors';
import { formatDuration } from '../utils/formatting';
import { TimeWeightedPriceOracle } from '../oracles/twap-oracle';

export interface PairHealth {
  pair: PairId;
  registered: boolean;
  ready: boolean;
  needsUpdate: boolean;
  olderTimestamp: number | null;
  newerTimestamp: number | null;
  elapsed: number | null;
}

export interface HealthReport {
  status: 'ok' | 'warming';
  timestamp: number;
  pairs: PairHealth[];
}

export function buildHealthReport(oracle: TimeWeightedPriceOracle, pairs: PairId[], clock: Clock): HealthReport {
  const entries = pairs.map((pair): PairHealth => {
    if (!oracle.isRegistered(pair)) {
      return { pair, registered: false, ready: false, needsUpdate: false, olderTimestamp: null, newerTimestamp: null, elapsed: null };
    }
    const info = oracle.getObservationInfo(pair);
    return {
      pair,
      registered: true,
      ready: oracle.isReady(pair),
      needsUpdate: oracle.needsUpdate(pair),
      olderTimestamp: info.olderTimestamp,
      newerTimestamp: info.newerTimestamp,
      elapsed: info.elapsed,
    };
  });

  return {
    status: entries.every((e) => e.ready) ? 'ok' : 'warming',
    timestamp: clock.now(),
    pairs: entries,
  };
}

/**
 * Console lines for a report, one per pair
 */
export function formatHealthReport(report: HealthReport): string[] {
  return report.pairs.map((p) => {
    if (!p.registered) {
      return `${p.pair.padEnd(14)} ${colorize('UNKNOWN PAIR', 'red')}`;
    }
    const age = p.elapsed === null ? 'no observations' : `newer ${formatDuration(p.elapsed)} ago`;
    const slots = p.olderTimestamp === null ? '1 slot' : '2 slots';
    return `${p.pair.padEnd(14)} ${readinessBadge(p.ready)}  ${age}${p.newerTimestamp === null ? '' : `, ${slots}`}`;
  });
}

/**
 * Protocol constants and runtime defaults
 */

/**
 * Fixed-point scale for prices, ratios and 18-decimal token amounts
 */
export const WAD = 10n ** 18n;

/**
 * Basis points denominator
 */
export const BPS = 10_000n;

/**
 * Minimum spacing between two TWAP observations (seconds)
 */
export const PERIOD = 30 * 60;

/**
 * UQ112x112 resolution used by pool price accumulators
 */
export const Q112 = 2n ** 112n;

/**
 * Swap fee applied by the simulated constant-product pool (per mille)
 */
export const POOL_FEE_PER_MILLE = 3n;

/**
 * Collateral ratio reported when no stable supply is outstanding
 */
export const UNBOUNDED_RATIO = 2n ** 256n - 1n;

/**
 * Pyth Hermes URL
 */
export const PYTH_HERMES_URL = process.env.PYTH_HERMES_URL || 'https://hermes.pyth.network';

/**
 * Maximum age accepted from a Pyth update before it is dropped (seconds)
 */
export const PYTH_MAX_AGE_SEC = 120;

/**
 * Keeper tick interval (milliseconds)
 */
export const TICK_MS = Number(process.env.KEEPER_TICK_MS || 60_000);

/**
 * Heartbeat interval (milliseconds)
 */
export const HEARTBEAT_MS = Number(process.env.KEEPER_HEARTBEAT_MS || 60_000);

/**
 * Health server port
 */
export const HEALTH_PORT = Number(process.env.HEALTH_PORT || 3000);

/**
 * Lock file name
 */
export const LOCK_FILE_NAME = '.keeper.lock';

/**
 * Default deployment file, relative to the app directory
 */
export const DEFAULT_DEPLOYMENT_FILE = 'deployment.json';

/**
 * Type definitions for the collateral protocol
 */

/**
 * Account identifier (user, engine, vault, administrator)
 */
export type AccountId = string;

/**
 * Asset symbol as configured in the deployment (e.g. WBTC, STABLE, BOND)
 */
export type AssetSymbol = string;

/**
 * Trading pair identifier (e.g. WBTC/USDC)
 */
export type PairId = string;

/**
 * Price validated across sources, 18-decimal fixed point
 */
export interface TrustedPrice {
  asset: AssetSymbol;
  value: bigint;
  asOf: number;
}

/**
 * Single reading from a push feed (value is 18-decimal fixed point, asOf in unix seconds)
 */
export interface FeedReading {
  value: bigint;
  asOf: number;
}

/**
 * Stored TWAP observation
 */
export interface Observation {
  timestamp: number;
  accumulator: bigint;
}

/**
 * Global collateral accounting
 */
export interface CollateralPosition {
  totalReserveUnits: bigint;
  totalStableSupplyTracked: bigint;
}

/**
 * Governance-controlled protocol parameters
 */
export interface GovernableParameters {
  mintFeeBps: bigint;
  redeemFeeBps: bigint;
  bondFloorPrice: bigint;
  maxBondRate: bigint;
  deviationToleranceBps: bigint;
}

export type ParameterKey = keyof GovernableParameters;

/**
 * Redemption payout across the three tiers
 */
export interface RedemptionResult {
  reserveOut: bigint;
  bondOut: bigint;
  backstopOut: bigint;
}

/**
 * Vault holdings
 */
export interface VaultBalances {
  reserve: bigint;
  backstop: bigint;
  stableHeld: bigint;
}

/**
 * Lock file data
 */
export interface LockFileData {
  pid: number;
  started: string;
  args: string[];
}

/**
 * CLI configuration options
 */
export interface CliOptions {
  verbose: boolean;
  logFile: string | null;
  configPath: string | null;
  port: number | null;
  serve: boolean;
  once: boolean;
  help: boolean;
}

/**
 * Structured failure codes surfaced to callers
 */
export type ProtocolErrorCode =
  | 'ZeroAmount'
  | 'InsufficientFunds'
  | 'InsufficientAllowance'
  | 'Unauthorized'
  | 'Paused'
  | 'PriceDeviation'
  | 'ObservationNotReady'
  | 'ReentrantCall'
  | 'RedemptionCapExceeded'
  | 'PriceUnavailable'
  | 'StalePrice'
  | 'InvalidParameter';

export type ErrorDetails = Record<string, string | number | boolean | null>;

/**
 * Structured reason for a rejected request
 */
export interface FailureReason {
  code: ProtocolErrorCode;
  message: string;
  details: ErrorDetails;
}

/**
 * Custom error types
 */
export class ProtocolError extends Error {
  constructor(
    message: string,
    public readonly code: ProtocolErrorCode,
    public readonly details: ErrorDetails = {}
  ) {
    super(message);
    this.name = 'ProtocolError';
  }

  toJSON(): FailureReason {
    return { code: this.code, message: this.message, details: this.details };
  }
}

export class ZeroAmountError extends ProtocolError {
  constructor(field: string) {
    super(`${field} must be non-zero`, 'ZeroAmount', { field });
    this.name = 'ZeroAmountError';
  }
}

export class InsufficientFundsError extends ProtocolError {
  constructor(asset: string, account: AccountId, required: bigint, available: bigint) {
    super(`Insufficient ${asset} balance for ${account}: need ${required}, have ${available}`, 'InsufficientFunds', {
      asset,
      account,
      required: required.toString(),
      available: available.toString(),
    });
    this.name = 'InsufficientFundsError';
  }
}

export class InsufficientAllowanceError extends ProtocolError {
  constructor(asset: string, owner: AccountId, spender: AccountId, required: bigint, available: bigint) {
    super(`Insufficient ${asset} allowance from ${owner} to ${spender}: need ${required}, have ${available}`, 'InsufficientAllowance', {
      asset,
      owner,
      spender,
      required: required.toString(),
      available: available.toString(),
    });
    this.name = 'InsufficientAllowanceError';
  }
}

export class UnauthorizedError extends ProtocolError {
  constructor(caller: AccountId, action: string) {
    super(`${caller} is not authorized to ${action}`, 'Unauthorized', { caller, action });
    this.name = 'UnauthorizedError';
  }
}

export class PausedError extends ProtocolError {
  constructor(operation: string) {
    super(`Protocol is paused: ${operation} rejected`, 'Paused', { operation });
    this.name = 'PausedError';
  }
}

export class PriceDeviationError extends ProtocolError {
  constructor(asset: AssetSymbol, poolPrice: bigint, reference: bigint, deviationBps: bigint, toleranceBps: bigint) {
    super(`${asset} price mismatch: pool ${poolPrice} vs reference ${reference} (${deviationBps} bps > ${toleranceBps} bps)`, 'PriceDeviation', {
      asset,
      poolPrice: poolPrice.toString(),
      reference: reference.toString(),
      deviationBps: deviationBps.toString(),
      toleranceBps: toleranceBps.toString(),
    });
    this.name = 'PriceDeviationError';
  }
}

export class ObservationNotReadyError extends ProtocolError {
  constructor(pair: PairId) {
    super(`No observation >= PERIOD ago for ${pair}`, 'ObservationNotReady', { pair });
    this.name = 'ObservationNotReadyError';
  }
}

export class ReentrantCallError extends ProtocolError {
  constructor(entry: string) {
    super(`Reentrant call into ${entry}`, 'ReentrantCall', { entry });
    this.name = 'ReentrantCallError';
  }
}

export class RedemptionCapExceededError extends ProtocolError {
  constructor(requested: bigint, cap: bigint) {
    super(`Bond redemption of ${requested} exceeds current cap ${cap}`, 'RedemptionCapExceeded', {
      requested: requested.toString(),
      cap: cap.toString(),
    });
    this.name = 'RedemptionCapExceededError';
  }
}

export class PriceUnavailableError extends ProtocolError {
  constructor(subject: string, reason: string) {
    super(`Price unavailable for ${subject}: ${reason}`, 'PriceUnavailable', { subject, reason });
    this.name = 'PriceUnavailableError';
  }
}

export class StalePriceError extends ProtocolError {
  constructor(feed: string, ageSec: number, maxAgeSec: number) {
    super(`Feed ${feed} is stale (${ageSec}s > ${maxAgeSec}s)`, 'StalePrice', { feed, ageSec, maxAgeSec });
    this.name = 'StalePriceError';
  }
}

export class InvalidParameterError extends ProtocolError {
  constructor(key: string, reason: string) {
    super(`Invalid parameter ${key}: ${reason}`, 'InvalidParameter', { key, reason });
    this.name = 'InvalidParameterError';
  }
}

/**
 * Operational errors (not part of the protocol taxonomy)
 */
export class ConfigurationError extends Error {
  public readonly code = 'CONFIG_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class LockFileError extends Error {
  public readonly code = 'LOCK_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'LockFileError';
  }
}

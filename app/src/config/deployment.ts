/**
 * Deployment description loaded from JSON
 */

import * as fs from 'fs';
import { AccountId, AssetSymbol, ConfigurationError, PairId, ParameterKey } from '../types';
import { parseUnits } from '../utils/fixed-point';
import { isParameterKey } from '../governance/parameter-store';

export type FeedSpec =
  | { kind: 'manual'; name: string; value: bigint }
  | { kind: 'pyth'; name: string; feedId: string }
  | { kind: 'product'; name: string; left: FeedSpec; right: FeedSpec }
  | { kind: 'unitOfAccount' };

export interface TokenSpec {
  symbol: AssetSymbol;
  decimals: number;
}

export interface PoolSpec {
  pair: PairId;
  token0: AssetSymbol;
  token1: AssetSymbol;
  /** Native token units */
  reserve0: bigint;
  reserve1: bigint;
}

export interface AssetSpec {
  pool?: PairId;
  feeds: FeedSpec[];
  maxFeedAgeSec?: number;
  requireCorroboration?: boolean;
  scaleByUnitOfAccount?: boolean;
}

export interface ProtocolRoles {
  reserve: AssetSymbol;
  stable: AssetSymbol;
  bond: AssetSymbol;
  backstop: AssetSymbol;
  unitOfAccount: AssetSymbol;
}

export interface DeploymentConfig {
  accounts: { admin: AccountId; engine: AccountId; vault: AccountId };
  tokens: TokenSpec[];
  roles: ProtocolRoles;
  pools: PoolSpec[];
  assets: Record<AssetSymbol, AssetSpec>;
  /** Fee/rate/tolerance values as integers, bondFloorPrice as a decimal price */
  parameters: Partial<Record<ParameterKey, bigint>>;
  unitOfAccount: { initialValue: bigint; basePce: bigint | null; pceFeed: FeedSpec; updaters: AccountId[] };
  /** Backstop tokens held by the vault at deployment (native units) */
  vaultBackstop: bigint;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function objectAt(value: unknown, path: string): JsonObject {
  if (!isObject(value)) {
    throw new ConfigurationError(`${path} must be an object`);
  }
  return value;
}

function arrayAt(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${path} must be an array`);
  }
  return value;
}

function stringAt(obj: JsonObject, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigurationError(`${path}.${key} must be a non-empty string`);
  }
  return value;
}

function optionalNumberAt(obj: JsonObject, key: string, path: string): number | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${path}.${key} must be a non-negative number`);
  }
  return value;
}

function optionalBooleanAt(obj: JsonObject, key: string, path: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`${path}.${key} must be a boolean`);
  }
  return value;
}

function amountAt(obj: JsonObject, key: string, path: string, decimals: number): bigint {
  const text = typeof obj[key] === 'number' ? String(obj[key]) : stringAt(obj, key, path);
  try {
    return parseUnits(text, decimals);
  } catch (error) {
    throw new ConfigurationError(`${path}.${key}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function parseFeed(value: unknown, path: string): FeedSpec {
  const obj = objectAt(value, path);
  const kind = stringAt(obj, 'kind', path);
  switch (kind) {
    case 'manual':
      return { kind, name: stringAt(obj, 'name', path), value: amountAt(obj, 'value', path, 18) };
    case 'pyth':
      if (!/^(0x)?[0-9a-fA-F]{64}$/.test(stringAt(obj, 'feedId', path))) {
        throw new ConfigurationError(`${path}.feedId must be a 32-byte hex id`);
      }
      return { kind, name: stringAt(obj, 'name', path), feedId: stringAt(obj, 'feedId', path) };
    case 'product':
      return {
        kind,
        name: stringAt(obj, 'name', path),
        left: parseFeed(obj.left, `${path}.left`),
        right: parseFeed(obj.right, `${path}.right`),
      };
    case 'unitOfAccount':
      return { kind };
    default:
      throw new ConfigurationError(`${path}.kind "${kind}" is not one of manual, pyth, product, unitOfAccount`);
  }
}

function parseAsset(value: unknown, path: string): AssetSpec {
  const obj = objectAt(value, path);
  const feeds = obj.feeds === undefined ? [] : arrayAt(obj.feeds, `${path}.feeds`);
  return {
    pool: obj.pool === undefined ? undefined : stringAt(obj, 'pool', path),
    feeds: feeds.map((f, i) => parseFeed(f, `${path}.feeds[${i}]`)),
    maxFeedAgeSec: optionalNumberAt(obj, 'maxFeedAgeSec', path),
    requireCorroboration: optionalBooleanAt(obj, 'requireCorroboration', path),
    scaleByUnitOfAccount: optionalBooleanAt(obj, 'scaleByUnitOfAccount', path),
  };
}

function parseParameters(value: unknown): Partial<Record<ParameterKey, bigint>> {
  if (value === undefined) {
    return {};
  }
  const obj = objectAt(value, 'parameters');
  const result: Partial<Record<ParameterKey, bigint>> = {};
  for (const key of Object.keys(obj)) {
    if (!isParameterKey(key)) {
      throw new ConfigurationError(`parameters.${key} is not a governable parameter`);
    }
    result[key] = amountAt(obj, key, 'parameters', key === 'bondFloorPrice' ? 18 : 0);
  }
  return result;
}

/**
 * Validate a parsed JSON document as a deployment
 */
export function parseDeployment(raw: unknown): DeploymentConfig {
  const root = objectAt(raw, 'deployment');

  const accounts = objectAt(root.accounts, 'accounts');
  const roles = objectAt(root.roles, 'roles');

  const tokens = arrayAt(root.tokens, 'tokens').map((t, i): TokenSpec => {
    const obj = objectAt(t, `tokens[${i}]`);
    const decimals = obj.decimals;
    if (typeof decimals !== 'number' || !Number.isInteger(decimals) || decimals < 0 || decimals > 18) {
      throw new ConfigurationError(`tokens[${i}].decimals must be an integer in [0, 18]`);
    }
    return { symbol: stringAt(obj, 'symbol', `tokens[${i}]`), decimals };
  });
  const decimalsOf = new Map(tokens.map((t) => [t.symbol, t.decimals]));

  const pools = arrayAt(root.pools, 'pools').map((p, i): PoolSpec => {
    const path = `pools[${i}]`;
    const obj = objectAt(p, path);
    const token0 = stringAt(obj, 'token0', path);
    const token1 = stringAt(obj, 'token1', path);
    for (const token of [token0, token1]) {
      if (!decimalsOf.has(token)) {
        throw new ConfigurationError(`${path} references unknown token ${token}`);
      }
    }
    return {
      pair: stringAt(obj, 'pair', path),
      token0,
      token1,
      reserve0: amountAt(obj, 'reserve0', path, decimalsOf.get(token0) ?? 18),
      reserve1: amountAt(obj, 'reserve1', path, decimalsOf.get(token1) ?? 18),
    };
  });

  const assetsObj = objectAt(root.assets, 'assets');
  const assets: Record<AssetSymbol, AssetSpec> = {};
  for (const symbol of Object.keys(assetsObj)) {
    const spec = parseAsset(assetsObj[symbol], `assets.${symbol}`);
    if (spec.pool !== undefined && !pools.some((p) => p.pair === spec.pool)) {
      throw new ConfigurationError(`assets.${symbol}.pool references unknown pool ${spec.pool}`);
    }
    assets[symbol] = spec;
  }

  const parsedRoles: ProtocolRoles = {
    reserve: stringAt(roles, 'reserve', 'roles'),
    stable: stringAt(roles, 'stable', 'roles'),
    bond: stringAt(roles, 'bond', 'roles'),
    backstop: stringAt(roles, 'backstop', 'roles'),
    unitOfAccount: stringAt(roles, 'unitOfAccount', 'roles'),
  };
  for (const role of ['reserve', 'stable', 'bond', 'backstop'] as const) {
    if (!decimalsOf.has(parsedRoles[role])) {
      throw new ConfigurationError(`roles.${role} references unknown token ${parsedRoles[role]}`);
    }
  }
  for (const role of ['reserve', 'bond', 'backstop', 'unitOfAccount'] as const) {
    if (!(parsedRoles[role] in assets)) {
      throw new ConfigurationError(`roles.${role} asset ${parsedRoles[role]} has no price configuration`);
    }
  }

  const uoa = objectAt(root.unitOfAccount, 'unitOfAccount');
  const updaters = uoa.updaters === undefined ? [] : arrayAt(uoa.updaters, 'unitOfAccount.updaters');

  return {
    accounts: {
      admin: stringAt(accounts, 'admin', 'accounts'),
      engine: stringAt(accounts, 'engine', 'accounts'),
      vault: stringAt(accounts, 'vault', 'accounts'),
    },
    tokens,
    roles: parsedRoles,
    pools,
    assets,
    parameters: parseParameters(root.parameters),
    unitOfAccount: {
      initialValue: uoa.initialValue === undefined ? parseUnits('1') : amountAt(uoa, 'initialValue', 'unitOfAccount', 18),
      basePce: uoa.basePce === undefined ? null : amountAt(uoa, 'basePce', 'unitOfAccount', 18),
      pceFeed: parseFeed(uoa.pceFeed, 'unitOfAccount.pceFeed'),
      updaters: updaters.map((u, i) => {
        if (typeof u !== 'string') {
          throw new ConfigurationError(`unitOfAccount.updaters[${i}] must be a string`);
        }
        return u;
      }),
    },
    vaultBackstop:
      root.vaultBackstop === undefined ? 0n : amountAt(root, 'vaultBackstop', 'deployment', decimalsOf.get(parsedRoles.backstop) ?? 18),
  };
}

/**
 * Read and validate a deployment file
 */
export function loadDeployment(filePath: string): DeploymentConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Deployment file not found: ${filePath}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Deployment file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseDeployment(raw);
}

#!/usr/bin/env node
/**
 * Protocol keeper - Main Entry Point
 *
 * Loads a deployment, assembles the collateral protocol and keeps its TWAP
 * observations PERIOD-spaced by poking every pair on a schedule.
 *
 * Features:
 * - Keeper loop with heartbeat
 * - Health server (GET /health, GET /api/prices, WebSocket broadcast)
 * - Pyth Hermes streaming for feeds declared as pyth
 * - Lock file to prevent multiple instances
 * - Structured logging with file output
 */

import * as path from 'path';
import { parseCliArgs, validateCliOptions, displayUsage } from './utils/cli-parser';
import { initLogger } from './utils/logger';
import { LockFileManager } from './utils/lock-file-manager';
import { SystemClock } from './utils/clock';
import { colors } from './config/colors';
import { DEFAULT_DEPLOYMENT_FILE, HEALTH_PORT, PYTH_HERMES_URL } from './config/constants';
import { DeploymentConfig, FeedSpec, loadDeployment } from './config/deployment';
import { PythPriceStream } from './feeds/pyth-feed';
import { Protocol, createProtocol, syncProtocol } from './app/protocol';
import { KeeperService } from './keeper/keeper-service';
import { HealthServer } from './keeper/health-server';
import { formatHealthReport } from './keeper/health';
import { formatPrice, formatRatio } from './utils/formatting';

function feedUsesPyth(spec: FeedSpec): boolean {
  if (spec.kind === 'pyth') {
    return true;
  }
  return spec.kind === 'product' && (feedUsesPyth(spec.left) || feedUsesPyth(spec.right));
}

function deploymentUsesPyth(deployment: DeploymentConfig): boolean {
  const feeds = Object.values(deployment.assets).flatMap((a) => a.feeds);
  return [...feeds, deployment.unitOfAccount.pceFeed].some(feedUsesPyth);
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  const options = parseCliArgs(process.argv);

  if (options.help) {
    displayUsage();
    process.exit(0);
  }

  const validationError = validateCliOptions(options);
  if (validationError) {
    console.error(`❌ ${validationError}\n`);
    displayUsage();
    process.exit(1);
  }

  const lockManager = new LockFileManager(path.join(__dirname, '..'));
  try {
    lockManager.create(process.argv.slice(2));
  } catch (error) {
    console.error(`\n❌ ERROR: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }

  const logger = initLogger({
    logFile: options.logFile,
    verbose: options.verbose,
  });

  const deploymentPath = options.configPath ?? path.join(__dirname, '..', DEFAULT_DEPLOYMENT_FILE);
  const clock = new SystemClock();
  let protocol: Protocol;
  try {
    const deployment = loadDeployment(deploymentPath);
    const pythStream = deploymentUsesPyth(deployment) ? new PythPriceStream(PYTH_HERMES_URL, logger.child('pyth')) : undefined;
    protocol = createProtocol(deployment, { clock, logger, pythStream });
  } catch (error) {
    logger.errorToConsole(`❌ ${error instanceof Error ? error.message : String(error)}`);
    logger.close();
    lockManager.remove();
    process.exit(1);
  }

  const keeper = new KeeperService({
    oracle: protocol.twap,
    clock,
    logger: logger.child('keeper'),
    beforeTick: () => {
      syncProtocol(protocol, logger);
    },
  });

  logger.logToConsole(colors.cyan + `Deployment: ${deploymentPath}` + colors.reset);
  logger.logToConsole(colors.gray + `Pairs: ${keeper.pairs().join(', ')}` + colors.reset);

  if (options.once) {
    keeper.tick();
    formatHealthReport(keeper.healthReport()).forEach((line) => logger.logToConsole(line));

    const prices = protocol.validator.getTrustedPrices();
    for (const [asset, check] of Object.entries(prices)) {
      const text = check.ok ? `$${formatPrice(check.price.value)}` : colors.yellow + check.reason.code + colors.reset;
      logger.logToConsole(`${asset.padEnd(14)} ${text}`);
    }
    const position = protocol.engine.position();
    if (position.totalStableSupplyTracked > 0n) {
      logger.logToConsole(`Collateral ratio: ${formatRatio(protocol.engine.collateralRatio())}`);
    }
    logger.close();
    lockManager.remove();
    return;
  }

  const server = options.serve
    ? new HealthServer({ keeper, validator: protocol.validator, engine: protocol.engine, logger: logger.child('health') })
    : null;

  const shutdown = async () => {
    console.log('\nStopping keeper…');
    keeper.stop();
    try {
      await server?.close();
      await protocol.pythStream?.close();
    } catch (error) {
      logger.error('Shutdown:', error instanceof Error ? error.message : String(error));
    }
    logger.close();
    lockManager.remove();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  try {
    if (protocol.pythStream) {
      await protocol.pythStream.subscribe();
      logger.logToConsole(colors.green + `✓ Connected to Pyth Network (${protocol.pythStream.getFeeds().length} feeds)` + colors.reset);
    }
    await server?.listen(options.port ?? HEALTH_PORT);
    keeper.start();
  } catch (error) {
    logger.errorToConsole('Fatal error:', error instanceof Error ? error.message : String(error));
    keeper.stop();
    logger.close();
    lockManager.remove();
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});

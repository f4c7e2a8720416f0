/**
 * CLI argument parser
 */

import { CliOptions } from '../types';

/**
 * Parse command line arguments
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const args = argv.slice(2);

  const verbose = args.includes('--verbose') || args.includes('-v');
  const help = args.includes('--help') || args.includes('-h');
  const once = args.includes('--once');
  const serve = !args.includes('--no-server');

  const logArg = args.find((a) => a.startsWith('--log='));
  const logFile = logArg?.split('=')[1] || null;

  const configArg = args.find((a) => a.startsWith('--config='));
  const configPath = configArg?.split('=')[1] || null;

  const portArg = args.find((a) => a.startsWith('--port='));
  const port = portArg ? Number(portArg.split('=')[1]) : null;

  return { verbose, logFile, configPath, port, serve, once, help };
}

/**
 * Validate CLI options, returning an error message or null
 */
export function validateCliOptions(options: CliOptions): string | null {
  if (options.port !== null && (!Number.isInteger(options.port) || options.port <= 0 || options.port > 65535)) {
    return `Invalid --port value: ${options.port}`;
  }
  return null;
}

/**
 * Display usage information
 */
export function displayUsage(): void {
  console.error('Usage:');
  console.error('  npm start -- [options]');
  console.error('');
  console.error('Options:');
  console.error('  --config=<file>    Deployment description (default: app/deployment.json)');
  console.error('  --port=<n>         Health server port (default: $HEALTH_PORT or 3000)');
  console.error('  --no-server        Run the keeper without the health server');
  console.error('  --once             Run one poke round, print readiness and exit');
  console.error('  --verbose, -v      Log every recorded observation');
  console.error('  --log=<file>       Write logs to specified file (appends)');
  console.error('  --help, -h         Show this message');
  console.error('');
  console.error('Environment:');
  console.error('  KEEPER_TICK_MS, KEEPER_HEARTBEAT_MS, HEALTH_PORT, PYTH_HERMES_URL');
}

/**
 * ANSI color codes for terminal output
 */

export const colors = {
  reset: '\x1b[0m',

  gray: '\x1b[90m',

  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
} as const;

/**
 * Colorize text with ANSI codes
 */
export function colorize(text: string, color: keyof typeof colors): string {
  return `${colors[color]}${text}${colors.reset}`;
}

/**
 * Strip ANSI color codes from text
 */
export function stripColors(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Readiness badge for health output
 */
export function readinessBadge(ready: boolean): string {
  return ready ? colorize('READY', 'green') : colorize('WARMING', 'yellow');
}

import chalk, { type ChalkInstance } from 'chalk';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Centralized color definitions. Respects NO_COLOR / FORCE_COLOR via chalk.

export const theme = {
  // Structural
  bold: chalk.bold,
  dim: chalk.dim,

  // Semantic
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,

  // Symbols
  check: chalk.green('✔'),
  cross: chalk.red('✖'),
  bullet: chalk.dim('•'),

  // Tiers: tier 1 is the loudest.
  tier: (tier: number): ChalkInstance => {
    const map: Record<number, ChalkInstance> = {
      1: chalk.red,
      2: chalk.yellow,
      3: chalk.cyan,
      4: chalk.dim
    };
    return map[tier] ?? chalk.white;
  },

  status: (status: string): ChalkInstance => {
    const map: Record<string, ChalkInstance> = {
      pass: chalk.green,
      merged: chalk.green,
      skipped: chalk.dim,
      'already-applied': chalk.dim,
      waived: chalk.yellow,
      fail: chalk.red,
      rejected: chalk.red,
      timeout: chalk.magenta
    };
    return map[status] ?? chalk.white;
  }
} as const;

// ── Layout Constants ────────────────────────────────────────────────────────

/** Default indent for nested content (two spaces). */
export const INDENT = '  ';

/** Width used for horizontal rules. */
export const RULE_WIDTH = 56;

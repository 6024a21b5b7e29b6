/**
 * Minter Logger
 *
 * Lines are prefixed with the collection symbol and, for child loggers,
 * the component that wrote them: `[MTNG:ledger] Phase Allowlist → Public`.
 */

import type { MinterConfig } from './config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  scope?: string;
  verbose?: boolean;
  silent?: boolean;
  sink?: LogSink;
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') console.error(line);
  else console.log(line);
};

const WEI_PER_ETHER = 10n ** 18n;

/** 50000000000000000n → "0.05 ETH" */
export function formatEther(wei: bigint): string {
  const whole = wei / WEI_PER_ETHER;
  const fraction = (wei % WEI_PER_ETHER).toString().padStart(18, '0').replace(/0+$/, '');
  return fraction ? `${whole}.${fraction} ETH` : `${whole} ETH`;
}

export class Logger {
  readonly scope: string;
  private verbose: boolean;
  private silent: boolean;
  private sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.scope = options.scope ?? 'minter';
    this.verbose = options.verbose ?? false;
    this.silent = options.silent ?? false;
    this.sink = options.sink ?? consoleSink;
  }

  /** Logger that drops every line; used by tests and embedded hosts */
  static silent(): Logger {
    return new Logger({ silent: true });
  }

  /** Root logger for a collection, scoped by its symbol */
  static forCollection(config: Pick<MinterConfig, 'symbol' | 'verbose'>, sink?: LogSink): Logger {
    return new Logger({ scope: config.symbol, verbose: config.verbose, sink });
  }

  /** Same settings and sink, scope extended with `component` */
  child(component: string): Logger {
    return new Logger({
      scope: `${this.scope}:${component}`,
      verbose: this.verbose,
      silent: this.silent,
      sink: this.sink,
    });
  }

  info(message: string): void {
    this.write('info', `[${this.scope}] ${message}`);
  }

  warn(message: string): void {
    this.write('warn', `[${this.scope}] ⚠️  ${message}`);
  }

  error(message: string): void {
    this.write('error', `[${this.scope}] ❌ ${message}`);
  }

  success(message: string): void {
    this.write('info', `[${this.scope}] ✓ ${message}`);
  }

  debug(message: string): void {
    if (this.verbose) this.write('debug', `[${this.scope}:debug] ${message}`);
  }

  // Status rows; bigint values are wei and print as ether
  status(label: string, value: string | number | bigint, color?: 'green' | 'yellow' | 'red'): void {
    const padding = 15 - label.length;
    const spaces = ' '.repeat(Math.max(0, padding));
    const text = typeof value === 'bigint' ? formatEther(value) : String(value);
    let coloredValue = text;

    // ANSI colors
    if (color === 'green') coloredValue = `\x1b[32m${text}\x1b[0m`;
    if (color === 'yellow') coloredValue = `\x1b[33m${text}\x1b[0m`;
    if (color === 'red') coloredValue = `\x1b[31m${text}\x1b[0m`;

    this.write('info', `${label}:${spaces}${coloredValue}`);
  }

  private write(level: LogLevel, line: string): void {
    if (this.silent) return;
    this.sink(level, line);
  }
}

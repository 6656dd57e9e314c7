import pc from 'picocolors';
import { sanitizeErrorForResponse } from './utils.js';

/**
 * Check Unicode symbol support
 * Older Windows terminals may not support it
 */
const supportsUnicode = (): boolean => {
  if (process.platform === 'win32') {
    return process.env.WT_SESSION !== undefined || // Windows Terminal
           process.env.TERM_PROGRAM === 'vscode' || // VS Code terminal
           process.env.CONEMU_BUILD !== undefined;  // ConEmu
  }
  return true;
};

const useUnicode = supportsUnicode();

const symbols = {
  arrow: useUnicode ? '→' : '->',
  error: useUnicode ? '✗' : '[E]',
  debug: useUnicode ? '·' : '[D]',
  info: useUnicode ? 'ℹ' : '[I]',
  success: useUnicode ? '✓' : '[OK]',
  warning: useUnicode ? '⚠' : '[!]',
};

const isDebugEnabled = (): boolean =>
  Boolean(process.env.DEBUG) || process.env.NODE_ENV === 'development';

/**
 * Console logging for the client and CLI
 */
export const logger = {
  /**
   * Log errors
   */
  error(message: string, error?: unknown): void {
    console.error(`${pc.red(symbols.error)} ${pc.bold(pc.red('Error'))} ${message}`);
    if (error) {
      // Sanitize error to prevent key leakage
      const sanitizedError = sanitizeErrorForResponse(error);
      console.error(`${pc.red(`   ${symbols.arrow}`)} ${sanitizedError}`);
    }
  },

  /**
   * Debug logging (only with DEBUG set or in dev mode)
   */
  debug(message: string, data?: unknown): void {
    if (isDebugEnabled()) {
      console.log(`${pc.gray(symbols.debug)} ${pc.bold(pc.gray('Debug'))} ${message}`);
      if (data) {
        const dataStr = typeof data === 'string'
          ? sanitizeErrorForResponse(data)
          : sanitizeErrorForResponse(JSON.stringify(data));
        const truncated = dataStr.substring(0, 200);
        console.log(`${pc.gray(`   ${symbols.arrow}`)} ${truncated}${truncated.length >= 200 ? '...' : ''}`);
      }
    }
  },

  info(message: string): void {
    console.log(`${pc.blue(symbols.info)} ${pc.bold(pc.blue('Info'))} ${message}`);
  },

  success(message: string): void {
    console.log(`${pc.green(symbols.success)} ${pc.bold(pc.green('Success'))} ${message}`);
  },

  warn(message: string): void {
    console.warn(`${pc.yellow(symbols.warning)} ${pc.bold(pc.yellow('Warning'))} ${message}`);
  },
};

/**
 * Message sink accepted by the client and mappers
 */
export type Logger = Pick<typeof logger, 'info' | 'warn' | 'error' | 'debug'>;

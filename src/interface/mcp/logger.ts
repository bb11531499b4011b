/**
 * MCP server logging
 * stdout is reserved for the MCP protocol (JSON-RPC); everything else goes to stderr
 */

import { createLogger, type LogFields, type LogLevel } from '../../shared/logger.js';

const logger = createLogger('mcp');

export function logToStderr(message: string, level: LogLevel = 'info', fields?: LogFields): void {
  logger[level](message, fields);
}

/**
 * Redirect console.log/info to stderr so nothing pollutes the protocol stream
 */
export function interceptConsole(): void {
  console.log = (...args: unknown[]) => {
    logToStderr(args.map(String).join(' '), 'info');
  };
  console.info = (...args: unknown[]) => {
    logToStderr(args.map(String).join(' '), 'info');
  };
  // console.warn and console.error already write to stderr
}

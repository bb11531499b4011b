/**
 * MCP error code definitions and error conversion
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { ConceptPathError, ConfigError } from '../../shared/errors.js';

export const CONCEPT_PATH_ERROR = {
  CONFIG_ERROR: -32010,
} as const;

export function toMcpError(error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }

  if (error instanceof ConfigError) {
    return new McpError(
      CONCEPT_PATH_ERROR.CONFIG_ERROR as ErrorCode,
      `Configuration error: ${error.message}`,
    );
  }

  if (error instanceof ConceptPathError) {
    return new McpError(ErrorCode.InternalError, error.message);
  }

  return new McpError(
    ErrorCode.InternalError,
    error instanceof Error ? error.message : 'Unknown error',
  );
}

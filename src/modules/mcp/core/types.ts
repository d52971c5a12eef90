/**
 * MCP Module - Types
 */

export interface McpConfig {
  /** Require the x-api-key header on /mcp */
  authRequired: boolean;
  /** Static API key for simple authentication */
  apiKey?: string | undefined;
}

export const DEFAULT_MCP_CONFIG: McpConfig = {
  authRequired: false,
};

export const MCP_SERVER_NAME = 'Illinois Local Government Fiscal Data';

/**
 * MCP Module - Public API
 *
 * Model Context Protocol tools, prompts and resources over the fiscal data.
 */

export type { McpConfig } from './core/types.js';
export { DEFAULT_MCP_CONFIG, MCP_SERVER_NAME } from './core/types.js';

export {
  EntityCodeInputZod,
  SearchEntityInputZod,
  CompareEntitiesInputZod,
  RankEntitiesInputZod,
  CountyEntitiesInputZod,
  CountySummaryInputZod,
} from './core/schemas/zod-schemas.js';

export {
  createMcpServer,
  runMcpServerStdio,
  type CreateMcpServerDeps,
} from './shell/server/mcp-server.js';

export { makeMcpRoutes, type MakeMcpRoutesDeps } from './shell/rest/routes.js';

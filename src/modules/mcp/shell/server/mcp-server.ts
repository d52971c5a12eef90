/**
 * MCP Server Factory
 *
 * Creates and configures the MCP server with all tools, resources, and prompts.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import {
  CALCULATE_FISCAL_HEALTH_SCORE_DESCRIPTION,
  COMPARE_ENTITIES_DESCRIPTION,
  FIND_PEER_ENTITIES_DESCRIPTION,
  GET_COUNTY_ENTITIES_DESCRIPTION,
  GET_COUNTY_FINANCIAL_SUMMARY_DESCRIPTION,
  GET_DEBT_DATA_DESCRIPTION,
  GET_ENTITY_DETAILS_DESCRIPTION,
  GET_EXPENDITURE_DATA_DESCRIPTION,
  GET_FUND_BALANCE_DATA_DESCRIPTION,
  GET_PENSION_DATA_DESCRIPTION,
  GET_REVENUE_DATA_DESCRIPTION,
  RANK_ENTITIES_DESCRIPTION,
  SEARCH_GOVERNMENT_ENTITY_DESCRIPTION,
} from './tool-descriptions.js';
import {
  toComparisonDto,
  toEntityDetailsDto,
  toPeerGroupDto,
  toRankedEntityDto,
} from '../../../entities/core/dto.js';
import { compareEntities } from '../../../entities/core/usecases/compare-entities.js';
import { findPeerEntities } from '../../../entities/core/usecases/find-peer-entities.js';
import { getEntity } from '../../../entities/core/usecases/get-entity.js';
import { rankEntities } from '../../../entities/core/usecases/rank-entities.js';
import { searchEntities } from '../../../entities/core/usecases/search-entities.js';
import {
  toDebtStatementDto,
  toFundBalanceStatementDto,
  toFundStatementDto,
  toPensionStatementDto,
} from '../../../finances/core/dto.js';
import { getDebt } from '../../../finances/core/usecases/get-debt.js';
import { getExpenditures } from '../../../finances/core/usecases/get-expenditures.js';
import { getFundBalances } from '../../../finances/core/usecases/get-fund-balances.js';
import { getPensions } from '../../../finances/core/usecases/get-pensions.js';
import { getRevenues } from '../../../finances/core/usecases/get-revenues.js';
import { toFiscalHealthDto } from '../../../fiscal-health/core/dto.js';
import { getFiscalHealth } from '../../../fiscal-health/core/usecases/get-fiscal-health.js';
import { toCountyEntityDto, toCountySummaryDto } from '../../../geography/core/dto.js';
import { getCountyEntities } from '../../../geography/core/usecases/get-county-entities.js';
import { getCountySummary } from '../../../geography/core/usecases/get-county-summary.js';
import {
  CompareEntitiesInputZod,
  CountyEntitiesInputZod,
  CountySummaryInputZod,
  EntityCodeInputZod,
  RankEntitiesInputZod,
  SearchEntityInputZod,
} from '../../core/schemas/zod-schemas.js';
import { MCP_SERVER_NAME } from '../../core/types.js';
import {
  COMPARISON_PROMPT,
  COUNTY_ANALYSIS_PROMPT,
  ENTITY_LOOKUP_PROMPT,
  FISCAL_HEALTH_PROMPT,
  FISCAL_QUERY_PROMPT,
} from '../prompts/prompt-templates.js';
import { getFinancialTermsGlossary } from '../resources/financial-terms-glossary.js';

import type { QueryError } from '../../../../common/types/errors.js';
import type { FiscalDataRepository } from '../../../fiscal-data/core/ports.js';
import type { ReferenceCodes } from '../../../fiscal-data/core/types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies required to create the MCP server.
 */
export interface CreateMcpServerDeps {
  fiscalDataRepo: FiscalDataRepository;
  referenceCodes: ReferenceCodes;
  version?: string | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Server Instructions
// ─────────────────────────────────────────────────────────────────────────────

const SERVER_INSTRUCTIONS = `
# Illinois Local Government Fiscal Data

You help users explore the Annual Financial Reports that Illinois units of local government (counties, cities, villages, townships and special districts) file with the State Comptroller.

## Entity codes
Every entity is identified by a code in "county/unit/type" form, e.g. "016/020/32". Codes come from search_government_entity; never guess one.

## Available Tools

### Lookup
- **search_government_entity**: Find entities by name or county
- **get_entity_details**: Profile, officials, population, EAV, employees

### Financial statements
- **get_revenue_data**, **get_expenditure_data**: By category and fund type
- **get_fund_balance_data**: GASB 54 classifications, unassigned reserve
- **get_debt_data**: Outstanding debt and instruments
- **get_pension_data**: IMRF, police and fire pension funds

### Analysis
- **calculate_fiscal_health_score**: Operating margin, fund balance ratio, debt per capita, pension funded ratio, each rated
- **compare_entities**, **find_peer_entities**, **rank_entities**

### Geography
- **get_county_entities**, **get_county_financial_summary**

## Recommended Workflow
1. search_government_entity to resolve the entity code (ask when several units share a name)
2. The statement or analysis tool that answers the question
3. Present amounts in US dollars with thousands separators; ratios as percentages

## Data
One reporting year per entity. Amounts are as reported; an empty statement means the entity did not report it. The glossary resource explains the financial terms.
`;

// ─────────────────────────────────────────────────────────────────────────────
// Tool Response Helpers
// ─────────────────────────────────────────────────────────────────────────────

/** Builds a successful MCP tool response with structured content */
const okResponse = (data: unknown) => {
  const body = { ok: true, data };
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(body) }],
    structuredContent: body,
  };
};

/** Builds an error MCP tool response with structured content */
const errResponse = (error: QueryError) => {
  const body = { ok: false, error: error.message, type: error.type };
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(body) }],
    structuredContent: body,
    isError: true as const,
  };
};

const toToolResponse = <T>(result: Result<T, QueryError>, toDto: (value: T) => unknown) =>
  result.isErr() ? errResponse(result.error) : okResponse(toDto(result.value));

const promptMessages = (text: string) => ({
  messages: [{ role: 'user' as const, content: { type: 'text' as const, text } }],
});

// ─────────────────────────────────────────────────────────────────────────────
// Server Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a configured MCP server with all tools registered.
 */
export function createMcpServer(deps: CreateMcpServerDeps): McpServer {
  const { fiscalDataRepo } = deps;
  const statementDeps = { fiscalDataRepo, referenceCodes: deps.referenceCodes };

  const server = new McpServer(
    {
      name: MCP_SERVER_NAME,
      version: deps.version ?? '1.0.0',
    },
    {
      instructions: SERVER_INSTRUCTIONS,
      capabilities: {
        tools: {},
      },
    }
  );

  // ─────────────────────────────────────────────────────────────────────────
  // Register Tools - Lookup
  // ─────────────────────────────────────────────────────────────────────────

  server.registerTool(
    'search_government_entity',
    {
      description: SEARCH_GOVERNMENT_ENTITY_DESCRIPTION,
      inputSchema: SearchEntityInputZod.shape,
    },
    async ({ query, limit }) => {
      const result = await searchEntities({ fiscalDataRepo }, { query, limit });
      return toToolResponse(result, (entities) => entities);
    }
  );

  server.registerTool(
    'get_entity_details',
    {
      description: GET_ENTITY_DETAILS_DESCRIPTION,
      inputSchema: EntityCodeInputZod.shape,
    },
    async ({ entity_code }) => {
      const result = await getEntity({ fiscalDataRepo }, entity_code);
      return toToolResponse(result, toEntityDetailsDto);
    }
  );

  // ─────────────────────────────────────────────────────────────────────────
  // Register Tools - Financial statements
  // ─────────────────────────────────────────────────────────────────────────

  server.registerTool(
    'get_revenue_data',
    {
      description: GET_REVENUE_DATA_DESCRIPTION,
      inputSchema: EntityCodeInputZod.shape,
    },
    async ({ entity_code }) => {
      const result = await getRevenues(statementDeps, entity_code);
      return toToolResponse(result, toFundStatementDto);
    }
  );

  server.registerTool(
    'get_expenditure_data',
    {
      description: GET_EXPENDITURE_DATA_DESCRIPTION,
      inputSchema: EntityCodeInputZod.shape,
    },
    async ({ entity_code }) => {
      const result = await getExpenditures(statementDeps, entity_code);
      return toToolResponse(result, toFundStatementDto);
    }
  );

  server.registerTool(
    'get_fund_balance_data',
    {
      description: GET_FUND_BALANCE_DATA_DESCRIPTION,
      inputSchema: EntityCodeInputZod.shape,
    },
    async ({ entity_code }) => {
      const result = await getFundBalances(statementDeps, entity_code);
      return toToolResponse(result, toFundBalanceStatementDto);
    }
  );

  server.registerTool(
    'get_debt_data',
    {
      description: GET_DEBT_DATA_DESCRIPTION,
      inputSchema: EntityCodeInputZod.shape,
    },
    async ({ entity_code }) => {
      const result = await getDebt(statementDeps, entity_code);
      return toToolResponse(result, toDebtStatementDto);
    }
  );

  server.registerTool(
    'get_pension_data',
    {
      description: GET_PENSION_DATA_DESCRIPTION,
      inputSchema: EntityCodeInputZod.shape,
    },
    async ({ entity_code }) => {
      const result = await getPensions(statementDeps, entity_code);
      return toToolResponse(result, toPensionStatementDto);
    }
  );

  // ─────────────────────────────────────────────────────────────────────────
  // Register Tools - Analysis
  // ─────────────────────────────────────────────────────────────────────────

  server.registerTool(
    'calculate_fiscal_health_score',
    {
      description: CALCULATE_FISCAL_HEALTH_SCORE_DESCRIPTION,
      inputSchema: EntityCodeInputZod.shape,
    },
    async ({ entity_code }) => {
      const result = await getFiscalHealth({ fiscalDataRepo }, entity_code);
      return toToolResponse(result, toFiscalHealthDto);
    }
  );

  server.registerTool(
    'compare_entities',
    {
      description: COMPARE_ENTITIES_DESCRIPTION,
      inputSchema: CompareEntitiesInputZod.shape,
    },
    async ({ entity_codes }) => {
      const result = await compareEntities({ fiscalDataRepo }, entity_codes);
      return toToolResponse(result, toComparisonDto);
    }
  );

  server.registerTool(
    'find_peer_entities',
    {
      description: FIND_PEER_ENTITIES_DESCRIPTION,
      inputSchema: EntityCodeInputZod.shape,
    },
    async ({ entity_code }) => {
      const result = await findPeerEntities({ fiscalDataRepo }, entity_code);
      return toToolResponse(result, toPeerGroupDto);
    }
  );

  server.registerTool(
    'rank_entities',
    {
      description: RANK_ENTITIES_DESCRIPTION,
      inputSchema: RankEntitiesInputZod.shape,
    },
    async ({ metric, order, entity_type, county, limit }) => {
      const result = await rankEntities(
        { fiscalDataRepo },
        { metric, order, entityType: entity_type, county, limit }
      );
      return toToolResponse(result, (ranked) => ranked.map(toRankedEntityDto));
    }
  );

  // ─────────────────────────────────────────────────────────────────────────
  // Register Tools - Geography
  // ─────────────────────────────────────────────────────────────────────────

  server.registerTool(
    'get_county_entities',
    {
      description: GET_COUNTY_ENTITIES_DESCRIPTION,
      inputSchema: CountyEntitiesInputZod.shape,
    },
    async ({ county, entity_type }) => {
      const result = await getCountyEntities(
        { fiscalDataRepo },
        { county, entityType: entity_type }
      );
      return toToolResponse(result, (entities) => entities.map(toCountyEntityDto));
    }
  );

  server.registerTool(
    'get_county_financial_summary',
    {
      description: GET_COUNTY_FINANCIAL_SUMMARY_DESCRIPTION,
      inputSchema: CountySummaryInputZod.shape,
    },
    async ({ county }) => {
      const result = await getCountySummary({ fiscalDataRepo }, county);
      return toToolResponse(result, toCountySummaryDto);
    }
  );

  // ─────────────────────────────────────────────────────────────────────────
  // Register Resources
  // ─────────────────────────────────────────────────────────────────────────

  server.registerResource(
    'financial_terms_glossary',
    'il-fiscal://glossary/financial-terms',
    {
      title: 'Financial Terms Glossary',
      description: 'Plain-language glossary of Illinois local government finance terms',
      mimeType: 'text/markdown',
    },
    (uri) => ({
      contents: [
        {
          uri: uri.href,
          text: getFinancialTermsGlossary(),
          mimeType: 'text/markdown',
        },
      ],
    })
  );

  server.registerResource(
    'reference_codes',
    'il-fiscal://reference/codes',
    {
      title: 'Reference Codes',
      description: 'Fund types, statement categories, debt instruments and entity type codes',
      mimeType: 'application/json',
    },
    (uri) => ({
      contents: [
        {
          uri: uri.href,
          text: JSON.stringify(deps.referenceCodes, null, 2),
          mimeType: 'application/json',
        },
      ],
    })
  );

  // ─────────────────────────────────────────────────────────────────────────
  // Register Prompts
  // ─────────────────────────────────────────────────────────────────────────

  server.registerPrompt(
    ENTITY_LOOKUP_PROMPT.name,
    {
      description: ENTITY_LOOKUP_PROMPT.description,
      argsSchema: ENTITY_LOOKUP_PROMPT.arguments.shape,
    },
    (args) => promptMessages(ENTITY_LOOKUP_PROMPT.template(args))
  );

  server.registerPrompt(
    FISCAL_QUERY_PROMPT.name,
    {
      description: FISCAL_QUERY_PROMPT.description,
      argsSchema: FISCAL_QUERY_PROMPT.arguments.shape,
    },
    (args) => promptMessages(FISCAL_QUERY_PROMPT.template(args))
  );

  server.registerPrompt(
    FISCAL_HEALTH_PROMPT.name,
    {
      description: FISCAL_HEALTH_PROMPT.description,
      argsSchema: FISCAL_HEALTH_PROMPT.arguments.shape,
    },
    (args) => promptMessages(FISCAL_HEALTH_PROMPT.template(args))
  );

  server.registerPrompt(
    COMPARISON_PROMPT.name,
    {
      description: COMPARISON_PROMPT.description,
      argsSchema: COMPARISON_PROMPT.arguments.shape,
    },
    (args) => promptMessages(COMPARISON_PROMPT.template(args))
  );

  server.registerPrompt(
    COUNTY_ANALYSIS_PROMPT.name,
    {
      description: COUNTY_ANALYSIS_PROMPT.description,
      argsSchema: COUNTY_ANALYSIS_PROMPT.arguments.shape,
    },
    (args) => promptMessages(COUNTY_ANALYSIS_PROMPT.template(args))
  );

  return server;
}

/**
 * Creates and runs the MCP server with stdio transport.
 * This is used for running the server as a standalone process.
 */
export async function runMcpServerStdio(deps: CreateMcpServerDeps): Promise<McpServer> {
  const server = createMcpServer(deps);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  return server;
}

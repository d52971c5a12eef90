/**
 * MCP Prompt Templates
 *
 * Guided workflows for the common kinds of questions about Illinois local
 * governments. Each template names the tools to call and how to present the
 * result.
 */

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────
// Prompt Argument Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const EntityLookupArgsSchema = z.object({
  name: z.string().describe('Name of the government to look up, e.g. "Village of Oak Park"'),
});

export const FiscalQueryArgsSchema = z.object({
  entity: z.string().describe('Entity name or code'),
  question: z.string().describe('What the user wants to know, e.g. "How much property tax?"'),
});

export const FiscalHealthArgsSchema = z.object({
  entity: z.string().describe('Entity name or code to assess'),
});

export const ComparisonArgsSchema = z.object({
  entities: z.string().describe('Comma-separated entity names or codes (2 to 10)'),
});

export const CountyAnalysisArgsSchema = z.object({
  county: z.string().describe('County name, e.g. "DuPage"'),
  entity_type: z
    .string()
    .optional()
    .describe('Optional entity type, e.g. "Fire Protection District"'),
});

// ─────────────────────────────────────────────────────────────────────────────
// Prompt Templates
// ─────────────────────────────────────────────────────────────────────────────

const RESOLVE_ENTITY_STEP = `Resolve the entity first with search_government_entity. When several units match (a village and a township often share a name), show the candidates with type and county and ask which one is meant.`;

export const ENTITY_LOOKUP_PROMPT = {
  name: 'entity-lookup',
  description: 'Find a unit of local government and present its profile',
  arguments: EntityLookupArgsSchema,
  template: (args: z.infer<typeof EntityLookupArgsSchema>) => `
# Entity lookup: ${args.name}

1. Call search_government_entity with the name "${args.name}".
2. ${RESOLVE_ENTITY_STEP}
3. Call get_entity_details with the chosen code.

Present: full name, entity type, county, population, EAV, home-rule status, employees, and the chief executive and financial officer when reported. Give the entity code so follow-up questions can use it.
`,
};

export const FISCAL_QUERY_PROMPT = {
  name: 'fiscal-query',
  description: 'Answer a question about revenues, spending, fund balances, debt or pensions',
  arguments: FiscalQueryArgsSchema,
  template: (args: z.infer<typeof FiscalQueryArgsSchema>) => `
# Fiscal question about ${args.entity}

Question: ${args.question}

1. ${RESOLVE_ENTITY_STEP}
2. Pick the statement that answers the question:
   - taxes, fees, grants → get_revenue_data
   - spending by function → get_expenditure_data
   - reserves → get_fund_balance_data
   - bonds and loans → get_debt_data
   - retirement obligations → get_pension_data
3. Quote exact amounts in US dollars with thousands separators and name the category and fund they come from.

When a statement has no lines, say the entity did not report it rather than that the amount is zero.
`,
};

export const FISCAL_HEALTH_PROMPT = {
  name: 'fiscal-health-assessment',
  description: 'Assess the financial condition of one entity',
  arguments: FiscalHealthArgsSchema,
  template: (args: z.infer<typeof FiscalHealthArgsSchema>) => `
# Fiscal health assessment: ${args.entity}

1. ${RESOLVE_ENTITY_STEP}
2. Call calculate_fiscal_health_score with the code.
3. Present an overall assessment, then each indicator with its value and rating:
   operating margin, fund balance ratio, debt per capita, pension funded ratio.
4. Point out the weakest indicators and what they mean for residents.

Be balanced: note strengths as well as concerns. Remind the reader that this is a single reporting year, that norms differ by entity type, and that a null indicator means the data needed for it was not reported.
`,
};

export const COMPARISON_PROMPT = {
  name: 'entity-comparison',
  description: 'Compare several entities, or an entity with its peers',
  arguments: ComparisonArgsSchema,
  template: (args: z.infer<typeof ComparisonArgsSchema>) => `
# Comparison: ${args.entities}

1. Resolve every entity to a code with search_government_entity.
2. With one entity only, call find_peer_entities to pick comparable units of the same type and size.
3. Call compare_entities with the codes (2 to 10).
4. For a deeper look, call calculate_fiscal_health_score for each entity.

Present a table (population, EAV, revenue, expenditure, per-capita figures) and explain the largest differences. Compare per-capita figures, not totals, when populations differ.
`,
};

export const COUNTY_ANALYSIS_PROMPT = {
  name: 'county-analysis',
  description: 'Describe the local governments of a county',
  arguments: CountyAnalysisArgsSchema,
  template: (args: z.infer<typeof CountyAnalysisArgsSchema>) => `
# County analysis: ${args.county} County${args.entity_type === undefined ? '' : ` (${args.entity_type})`}

1. Call get_county_financial_summary for "${args.county}".
2. Call get_county_entities for "${args.county}"${args.entity_type === undefined ? '' : ` with entity_type "${args.entity_type}"`}.
3. Use rank_entities with the county filter for "largest" or "smallest" questions.

Group entities by type, sort by population, and highlight notable units. Illinois has 102 counties and not every county has every kind of district; say so when a type is missing.
`,
};

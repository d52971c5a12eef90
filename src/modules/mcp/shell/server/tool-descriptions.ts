/**
 * MCP Tool Descriptions
 */

export const SEARCH_GOVERNMENT_ENTITY_DESCRIPTION = `Search Illinois units of local government by name or county.

**Purpose:**
- Resolve a name the user mentions ("Naperville", "Cook County Forest Preserve") to an entity code
- Every other entity tool needs the code returned here

**Output:**
- Matches with code, name, entity type and county; exact name matches first, then prefix matches

**Tips:**
- Several units often share a name (a village and a township, a park district and a library). Check entity type and county before picking one
- Ask the user to choose when more than one match is plausible`;

export const GET_ENTITY_DETAILS_DESCRIPTION = `Get the profile of one entity: type, county, chief executive and financial officer, population, equalized assessed valuation (EAV), employees, home-rule status and debt flags.`;

export const GET_REVENUE_DATA_DESCRIPTION = `Get the revenue statement of one entity.

**Output:**
- One line per revenue category (codes 201t-236t, e.g. 201t = Property Taxes) with the amount in each fund type
- Fund totals and the overall total

Fund types: general, special revenue, capital projects, debt service, enterprise, trust, fiduciary.`;

export const GET_EXPENDITURE_DATA_DESCRIPTION = `Get the expenditure statement of one entity.

**Output:**
- One line per function (codes 251t-280t, e.g. public safety, highways and streets) with the amount in each fund type
- Fund totals and the overall total`;

export const GET_FUND_BALANCE_DATA_DESCRIPTION = `Get fund balances of one entity by GASB 54 classification.

Classifications: Nonspendable (302t), Restricted (303t), Committed (304t), Assigned (305t), Unassigned (307t), Total (308t).
The general-fund Unassigned balance is the reserve available for any purpose and drives the fund balance ratio.`;

export const GET_DEBT_DATA_DESCRIPTION = `Get outstanding debt of one entity.

**Output:**
- Long-term and short-term debt outstanding, their total and debt per resident
- Beginning balances by instrument: general obligation bonds (full faith and credit), revenue bonds (specific revenue streams), alternate revenue bonds (hybrid backing), contractual commitments (leases, installment purchases) and other debt
- reported = false when the entity filed no indebtedness schedule; totals are then zero`;

export const GET_PENSION_DATA_DESCRIPTION = `Get pension systems of one entity.

Systems: IMRF (Illinois Municipal Retirement Fund), Article 3 police pension fund, Article 4 firefighters' pension fund.
Only systems with a positive total pension liability are listed. For each: total liability, plan assets, net liability (liability minus assets; positive = underfunded) and funded ratio in percent.`;

export const CALCULATE_FISCAL_HEALTH_SCORE_DESCRIPTION = `Calculate fiscal health indicators and ratings for one entity.

**Metrics:**
1. Operating margin = (revenue - expenditure) / revenue. Excellent >= 5%, Good >= 0%, Fair >= -5%, else Poor
2. Fund balance ratio = unassigned fund balance / expenditure. Excellent >= 25%, Good >= 15%, Fair >= 8%, else Poor
3. Debt per capita = total debt / population. Low <= $1,000, Moderate <= $2,500, High <= $5,000, else Very High
4. Pension funded ratio = weakest reported system. Excellent >= 80%, Good >= 60%, Fair >= 40%, else Critical

A metric is null when it cannot be computed (no revenue, no expenditure, no population or no pension data).

**Caveats:**
- One reporting year only; trends matter more than a single year
- Norms differ between entity types`;

export const COMPARE_ENTITIES_DESCRIPTION = `Compare 2 to 10 entities side by side: population, EAV, total revenue, total expenditure, and revenue and expenditure per resident. Codes that do not exist are listed in notFound.`;

export const FIND_PEER_ENTITIES_DESCRIPTION = `Find peers of one entity: same entity type, population within 25% of its own, closest first (up to 10). Entities without a population have no peers.`;

export const RANK_ENTITIES_DESCRIPTION = `Rank entities by population, EAV or total employees, optionally within one entity type and/or county. Tied values share a rank.

**Examples:**
- Largest villages in Cook County: { metric: "population", entity_type: "Village", county: "Cook" }
- Smallest park districts by EAV: { metric: "eav", order: "bottom", entity_type: "Park District" }`;

export const GET_COUNTY_ENTITIES_DESCRIPTION = `List the units of local government in one county, largest population first, optionally filtered by entity type.`;

export const GET_COUNTY_FINANCIAL_SUMMARY_DESCRIPTION = `Summarize one county: number of reporting units and entity types, total population, EAV and employees, home-rule units and units reporting debt.`;

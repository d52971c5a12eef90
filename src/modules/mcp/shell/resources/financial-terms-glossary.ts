/**
 * Financial Terms Glossary
 */

export function getFinancialTermsGlossary(): string {
  return `# Glossary - Illinois Local Government Finance

## Entities

### Unit of local government
A county, municipality (city, village, town), township or special district (park, library, fire protection, sanitary, water, and others) that files an Annual Financial Report with the Illinois Comptroller.

### Entity code
Identifier of a reporting unit in "county/unit/type" form, e.g. "016/020/32". The last segment is the entity type code.

### Home rule
Constitutional status giving a municipality or county broad taxing and regulatory powers. Municipalities over 25,000 residents have it automatically; smaller ones may adopt it by referendum.

### EAV (Equalized Assessed Valuation)
Taxable value of property after state equalization. Property tax rates are applied to it.

## Funds

### Governmental fund types
- **General**: day-to-day operations, not restricted to a purpose
- **Special revenue**: revenue restricted or committed to a purpose (e.g. motor fuel tax)
- **Capital projects**: acquisition or construction of capital assets
- **Debt service**: principal and interest payments

### Proprietary and fiduciary fund types
- **Enterprise**: services charged to users like a business (water, sewer)
- **Trust / fiduciary**: resources held for others, including pension trust funds

## Fund balance (GASB 54)

- **Nonspendable**: not in spendable form (inventory, prepaid items)
- **Restricted**: constrained by creditors, grantors or law
- **Committed**: constrained by the governing board's own formal action
- **Assigned**: intended for a purpose but not formally committed
- **Unassigned**: available for any purpose; the reserve cushion

## Debt

- **General obligation bonds**: backed by the full faith, credit and taxing power
- **Revenue bonds**: repaid from a specific revenue stream
- **Alternate revenue bonds**: repaid from a revenue source, with property taxes as backup
- **Contractual commitments**: leases and installment purchase contracts

## Pensions

- **IMRF**: Illinois Municipal Retirement Fund, the statewide multi-employer plan for most non-public-safety employees
- **Police and firefighters' pension funds**: locally administered Article 3 and Article 4 funds
- **Total pension liability**: present value of benefits earned to date
- **Funded ratio**: plan assets as a percentage of total pension liability

## Fiscal health indicators

- **Operating margin**: (revenue - expenditure) / revenue
- **Fund balance ratio**: unassigned fund balance / expenditure; 25% is roughly three months of spending
- **Debt per capita**: total outstanding debt / population
- **Pension funded ratio**: the weakest funded ratio among the entity's pension systems. A ratio reported as 0 is read as "no such system", so a plan that is truly 0% funded does not show up here
`;
}

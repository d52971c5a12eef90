import { Decimal } from 'decimal.js';
import { ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import {
  getExpenditures,
  getFundBalances,
  getRevenues,
  toFundBalanceStatementDto,
  toFundStatementDto,
} from '@/modules/finances/index.js';

import {
  ELM_GROVE,
  OAK_RIDGE,
  makeFundLine,
  makeReferenceCodes,
} from '../../fixtures/builders.js';
import { makeFailingFiscalDataRepo, makeFixtureRepo } from '../../fixtures/fakes.js';

describe('getRevenues', () => {
  const deps = { fiscalDataRepo: makeFixtureRepo(), referenceCodes: makeReferenceCodes() };

  it('labels categories and totals every line and fund', async () => {
    const statement = (await getRevenues(deps, OAK_RIDGE))._unsafeUnwrap();

    expect(toFundStatementDto(statement)).toEqual({
      entity: { code: OAK_RIDGE, name: 'Village of Oak Ridge', entityType: 'Village', county: 'Cook' },
      lines: [
        {
          category: '201t',
          label: 'Property Taxes',
          amounts: {
            general: 100000000,
            specialRevenue: 40000000,
            capitalProjects: 0,
            debtService: 0,
            enterprise: 0,
            trust: 0,
            fiduciary: 0,
          },
          total: 140000000,
        },
        {
          category: '203t',
          label: 'Sales Tax',
          amounts: {
            general: 40000000,
            specialRevenue: 0,
            capitalProjects: 0,
            debtService: 0,
            enterprise: 0,
            trust: 0,
            fiduciary: 0,
          },
          total: 40000000,
        },
      ],
      fundTotals: {
        general: 140000000,
        specialRevenue: 40000000,
        capitalProjects: 0,
        debtService: 0,
        enterprise: 0,
        trust: 0,
        fiduciary: 0,
      },
      total: 180000000,
    });
  });

  it('falls back to the category code for an unknown category', async () => {
    const fiscalDataRepo = {
      ...makeFixtureRepo(),
      listRevenueLines: async () => ok([makeFundLine('299t', { trust: new Decimal('12.34') })]),
    };

    const statement = (
      await getRevenues({ fiscalDataRepo, referenceCodes: makeReferenceCodes() }, OAK_RIDGE)
    )._unsafeUnwrap();

    expect(statement.lines[0]?.label).toBe('299t');
    expect(statement.total.toString()).toBe('12.34');
  });

  it('returns NotFoundError for an unknown entity', async () => {
    const result = await getRevenues(deps, '123/456/78');

    expect(result._unsafeUnwrapErr().type).toBe('NotFoundError');
  });

  it('propagates repository failures', async () => {
    const result = await getRevenues(
      { fiscalDataRepo: makeFailingFiscalDataRepo(), referenceCodes: makeReferenceCodes() },
      OAK_RIDGE
    );

    expect(result._unsafeUnwrapErr().type).toBe('DatabaseError');
  });
});

describe('getExpenditures', () => {
  it('labels functions and sums the statement', async () => {
    const statement = (
      await getExpenditures(
        { fiscalDataRepo: makeFixtureRepo(), referenceCodes: makeReferenceCodes() },
        OAK_RIDGE
      )
    )._unsafeUnwrap();

    expect(statement.lines.map((line) => [line.label, line.total.toNumber()])).toEqual([
      ['General Government', 120000000],
      ['Public Safety', 50000000],
    ]);
    expect(statement.total.toString()).toBe('170000000');
  });
});

describe('getFundBalances', () => {
  const deps = { fiscalDataRepo: makeFixtureRepo(), referenceCodes: makeReferenceCodes() };

  it('lists classifications with debt principal and the unassigned balance', async () => {
    const statement = (await getFundBalances(deps, OAK_RIDGE))._unsafeUnwrap();
    const dto = toFundBalanceStatementDto(statement);

    expect(dto.lines.map((line) => [line.category, line.label, line.total, line.debtPrincipal])).toEqual([
      ['307t', 'Unassigned', 30000000, 0],
      ['308t', 'Total Fund Balance', 45000000, 2000000],
    ]);
    expect(dto.unassigned).toBe(30000000);
  });

  it('reports a zero unassigned balance when none was filed', async () => {
    const statement = (await getFundBalances(deps, ELM_GROVE))._unsafeUnwrap();

    expect(statement.lines).toEqual([]);
    expect(statement.unassigned.isZero()).toBe(true);
  });
});

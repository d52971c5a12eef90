import { describe, expect, it } from 'vitest';

import { compareEntities, toComparisonDto } from '@/modules/entities/index.js';

import { ELM_GROVE, OAK_RIDGE, RIVERSIDE_PARKS } from '../../fixtures/builders.js';
import { makeFailingFiscalDataRepo, makeFixtureRepo } from '../../fixtures/fakes.js';

describe('compareEntities', () => {
  const deps = { fiscalDataRepo: makeFixtureRepo() };

  it('compares entities and reports unknown codes', async () => {
    const result = await compareEntities(deps, [OAK_RIDGE, ` ${ELM_GROVE} `, OAK_RIDGE, '999/999/99']);

    const comparison = result._unsafeUnwrap();
    expect(comparison.entities.map((row) => row.code)).toEqual([OAK_RIDGE, ELM_GROVE]);
    expect(comparison.notFound).toEqual(['999/999/99']);

    const oak = comparison.entities[0];
    expect(oak?.totalRevenue.toString()).toBe('180000000');
    expect(oak?.totalExpenditure.toString()).toBe('170000000');
    expect(oak?.revenuePerCapita?.toFixed(2)).toBe('2769.23');
  });

  it('leaves per-capita figures null without a population', async () => {
    const result = await compareEntities(deps, [OAK_RIDGE, RIVERSIDE_PARKS]);

    const riverside = result._unsafeUnwrap().entities[1];
    expect(riverside?.totalRevenue.isZero()).toBe(true);
    expect(riverside?.revenuePerCapita).toBeNull();
    expect(riverside?.expenditurePerCapita).toBeNull();
  });

  it.each([
    ['one code', [OAK_RIDGE]],
    ['duplicates of one code', [OAK_RIDGE, ` ${OAK_RIDGE}`, '']],
    ['eleven codes', Array.from({ length: 11 }, (_, i) => `code-${String(i)}`)],
  ])('rejects %s', async (_label, codes) => {
    const result = await compareEntities(deps, codes);

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'ValidationError',
      message: 'Provide between 2 and 10 distinct entity codes',
      field: 'codes',
    });
  });

  it('fails as a whole when the repository fails', async () => {
    const result = await compareEntities({ fiscalDataRepo: makeFailingFiscalDataRepo() }, [
      OAK_RIDGE,
      ELM_GROVE,
    ]);

    expect(result._unsafeUnwrapErr().type).toBe('DatabaseError');
  });

  it('serializes decimals as numbers', async () => {
    const comparison = (await compareEntities(deps, [ELM_GROVE, OAK_RIDGE]))._unsafeUnwrap();

    expect(toComparisonDto(comparison).entities[0]).toEqual({
      code: ELM_GROVE,
      name: 'Village of Elm Grove',
      entityType: 'Village',
      county: 'Cook',
      population: 52000,
      assessedValue: 900000000,
      totalRevenue: 30000000,
      totalExpenditure: 33000000,
      revenuePerCapita: expect.closeTo(576.923, 3),
      expenditurePerCapita: expect.closeTo(634.615, 3),
    });
  });
});

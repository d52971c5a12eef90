import { describe, expect, it } from 'vitest';

import {
  getCountyEntities,
  getCountySummary,
  toCountyEntityDto,
  toCountySummaryDto,
} from '@/modules/geography/index.js';

import { COOK_TOWNSHIP, ELM_GROVE, MAPLE_PARK, OAK_RIDGE } from '../../fixtures/builders.js';
import { makeFixtureRepo } from '../../fixtures/fakes.js';

const deps = { fiscalDataRepo: makeFixtureRepo() };

describe('getCountyEntities', () => {
  it('lists a county largest first', async () => {
    const entities = (await getCountyEntities(deps, { county: ' cook ' }))._unsafeUnwrap();

    expect(entities.map((e) => e.code)).toEqual([MAPLE_PARK, OAK_RIDGE, COOK_TOWNSHIP, ELM_GROVE]);
  });

  it('filters by entity type and ignores a blank type', async () => {
    const townships = await getCountyEntities(deps, { county: 'Cook', entityType: 'TOWNSHIP' });
    const all = await getCountyEntities(deps, { county: 'Cook', entityType: ' ' });

    expect(townships._unsafeUnwrap().map((e) => e.code)).toEqual([COOK_TOWNSHIP]);
    expect(all._unsafeUnwrap()).toHaveLength(4);
  });

  it('returns an empty list for an unknown county', async () => {
    expect((await getCountyEntities(deps, { county: 'Lake' }))._unsafeUnwrap()).toEqual([]);
  });

  it('requires a county name', async () => {
    const result = await getCountyEntities(deps, { county: '   ' });

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'ValidationError',
      message: 'County name is required',
    });
  });

  it('serializes entities', async () => {
    const entities = (await getCountyEntities(deps, { county: 'Cook' }))._unsafeUnwrap();

    expect(entities.map(toCountyEntityDto)[0]).toEqual({
      code: MAPLE_PARK,
      name: 'Village of Maple Park',
      entityType: 'Village',
      county: 'Cook',
      population: 80000,
      assessedValue: null,
      homeRule: true,
    });
  });
});

describe('getCountySummary', () => {
  it('aggregates a county', async () => {
    const summary = (await getCountySummary(deps, 'Cook'))._unsafeUnwrap();

    expect(toCountySummaryDto(summary)).toEqual({
      county: 'Cook',
      entityCount: 4,
      entityTypeCount: 2,
      totalPopulation: 257000,
      totalAssessedValue: 2600000000,
      totalFullTimeEmployees: 690,
      totalPartTimeEmployees: 75,
      homeRuleCount: 2,
      entitiesWithDebt: 2,
    });
  });

  it('returns NotFoundError for a county without units', async () => {
    const result = await getCountySummary(deps, 'Lake');

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'NotFoundError',
      message: "County with id 'Lake' not found",
    });
  });

  it('requires a county name', async () => {
    expect((await getCountySummary(deps, ''))._unsafeUnwrapErr().type).toBe('ValidationError');
  });
});

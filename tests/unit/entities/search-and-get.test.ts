import { ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import { getEntity, searchEntities, toEntityDetailsDto } from '@/modules/entities/index.js';

import { OAK_RIDGE } from '../../fixtures/builders.js';
import { makeFailingFiscalDataRepo, makeFixtureRepo } from '../../fixtures/fakes.js';

import type { FiscalDataRepository } from '@/modules/fiscal-data/index.js';

describe('searchEntities', () => {
  const recordSearch = () => {
    const calls: { term: string; limit: number }[] = [];
    const fiscalDataRepo: FiscalDataRepository = {
      ...makeFixtureRepo(),
      searchEntities: async (term, limit) => {
        calls.push({ term, limit });
        return ok([]);
      },
    };
    return { calls, deps: { fiscalDataRepo } };
  };

  it('rejects queries shorter than two characters after trimming', async () => {
    const result = await searchEntities({ fiscalDataRepo: makeFixtureRepo() }, { query: ' o ' });

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'ValidationError',
      message: 'Search query must be at least 2 characters',
      field: 'query',
    });
  });

  it('passes the trimmed query with the default limit', async () => {
    const { calls, deps } = recordSearch();

    await searchEntities(deps, { query: '  Oak  ' });

    expect(calls).toEqual([{ term: 'Oak', limit: 10 }]);
  });

  it('clamps the limit', async () => {
    const { calls, deps } = recordSearch();

    await searchEntities(deps, { query: 'oak', limit: 500 });
    await searchEntities(deps, { query: 'oak', limit: 0 });

    expect(calls.map((c) => c.limit)).toEqual([50, 1]);
  });

  it('returns matching entities', async () => {
    const result = await searchEntities({ fiscalDataRepo: makeFixtureRepo() }, { query: 'pine' });

    expect(result._unsafeUnwrap().map((e) => e.name)).toEqual(['Village of Pine Bluff']);
  });
});

describe('getEntity', () => {
  it('finds an entity by trimmed code', async () => {
    const result = await getEntity({ fiscalDataRepo: makeFixtureRepo() }, ` ${OAK_RIDGE}\t`);

    expect(result._unsafeUnwrap().name).toBe('Village of Oak Ridge');
  });

  it('returns NotFoundError for an unknown code', async () => {
    const result = await getEntity({ fiscalDataRepo: makeFixtureRepo() }, '000/000/00');

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'NotFoundError',
      message: "Entity with id '000/000/00' not found",
      resource: 'Entity',
      id: '000/000/00',
    });
  });

  it('propagates repository failures', async () => {
    const result = await getEntity({ fiscalDataRepo: makeFailingFiscalDataRepo() }, OAK_RIDGE);

    expect(result._unsafeUnwrapErr().type).toBe('DatabaseError');
  });
});

describe('toEntityDetailsDto', () => {
  it('serializes the assessed value as a number', async () => {
    const entity = (await getEntity({ fiscalDataRepo: makeFixtureRepo() }, OAK_RIDGE))._unsafeUnwrap();

    expect(toEntityDetailsDto(entity)).toEqual({
      code: OAK_RIDGE,
      name: 'Village of Oak Ridge',
      entityType: 'Village',
      entityTypeCode: 32,
      county: 'Cook',
      ceo: { firstName: 'Jane', lastName: 'Doe', title: 'Mayor' },
      cfo: { firstName: 'John', lastName: 'Roe', title: 'Finance Director' },
      population: 65000,
      assessedValue: 1500000000,
      fullTimeEmployees: 300,
      partTimeEmployees: 50,
      homeRule: true,
      hasDebt: true,
      hasBondedDebt: true,
    });
  });
});

import { ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import {
  findPeerEntities,
  rankEntities,
  toPeerGroupDto,
  toRankedEntityDto,
} from '@/modules/entities/index.js';

import {
  ELM_GROVE,
  MAPLE_PARK,
  OAK_RIDGE,
  RIVERSIDE_PARKS,
} from '../../fixtures/builders.js';
import { makeFixtureRepo, withCallCounts } from '../../fixtures/fakes.js';

import type { FiscalDataRepository, RankQuery } from '@/modules/fiscal-data/index.js';

describe('rankEntities', () => {
  const recordRank = () => {
    const queries: RankQuery[] = [];
    const fiscalDataRepo: FiscalDataRepository = {
      ...makeFixtureRepo(),
      rankEntities: async (query) => {
        queries.push(query);
        return ok([]);
      },
    };
    return { queries, deps: { fiscalDataRepo } };
  };

  it('defaults to the top ten', async () => {
    const { queries, deps } = recordRank();

    await rankEntities(deps, { metric: 'population' });

    expect(queries).toEqual([
      { metric: 'population', order: 'top', entityType: undefined, county: undefined, limit: 10 },
    ]);
  });

  it('clamps the limit and ignores blank filters', async () => {
    const { queries, deps } = recordRank();

    await rankEntities(deps, {
      metric: 'eav',
      order: 'bottom',
      entityType: '  ',
      county: ' Cook ',
      limit: 99,
    });

    expect(queries[0]).toEqual({
      metric: 'eav',
      order: 'bottom',
      entityType: undefined,
      county: 'Cook',
      limit: 50,
    });
  });

  it('ranks fixture entities', async () => {
    const result = await rankEntities(
      { fiscalDataRepo: makeFixtureRepo() },
      { metric: 'population', entityType: 'Village', limit: 2 }
    );

    expect(result._unsafeUnwrap().map(toRankedEntityDto)).toEqual([
      {
        rank: 1,
        code: MAPLE_PARK,
        name: 'Village of Maple Park',
        entityType: 'Village',
        county: 'Cook',
        value: 80000,
      },
      {
        rank: 2,
        code: OAK_RIDGE,
        name: 'Village of Oak Ridge',
        entityType: 'Village',
        county: 'Cook',
        value: 65000,
      },
    ]);
  });
});

describe('findPeerEntities', () => {
  it('finds same-type peers within 25% of the population', async () => {
    const result = await findPeerEntities({ fiscalDataRepo: makeFixtureRepo() }, OAK_RIDGE);

    const group = result._unsafeUnwrap();
    expect(group.entity).toEqual({
      code: OAK_RIDGE,
      name: 'Village of Oak Ridge',
      entityType: 'Village',
      county: 'Cook',
      population: 65000,
    });
    expect(group.populationWindow).toEqual({ min: 48750, max: 81250 });
    expect(group.peers.map((p) => p.code)).toEqual([ELM_GROVE, MAPLE_PARK]);
  });

  it('skips the peer query for an entity without a population', async () => {
    const { repo, calls } = withCallCounts(makeFixtureRepo());

    const group = (await findPeerEntities({ fiscalDataRepo: repo }, RIVERSIDE_PARKS))._unsafeUnwrap();

    expect(group.populationWindow).toBeNull();
    expect(group.peers).toEqual([]);
    expect(calls.get('findPeers')).toBeUndefined();
  });

  it('returns NotFoundError for an unknown code', async () => {
    const result = await findPeerEntities({ fiscalDataRepo: makeFixtureRepo() }, 'nope');

    expect(result._unsafeUnwrapErr().type).toBe('NotFoundError');
  });

  it('serializes peers with numeric assessed values', async () => {
    const group = (
      await findPeerEntities({ fiscalDataRepo: makeFixtureRepo() }, OAK_RIDGE)
    )._unsafeUnwrap();

    expect(toPeerGroupDto(group).peers[0]).toEqual({
      code: ELM_GROVE,
      name: 'Village of Elm Grove',
      entityType: 'Village',
      county: 'Cook',
      population: 52000,
      assessedValue: 900000000,
      populationDifference: 13000,
    });
  });
});

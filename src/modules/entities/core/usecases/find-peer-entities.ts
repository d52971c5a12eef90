/**
 * Use case: Find entities comparable to a given one.
 */

import { ok, err, type Result } from 'neverthrow';

import { requireEntity } from '../../../fiscal-data/core/require-entity.js';
import { PEER_LIMIT, PEER_POPULATION_RANGE, type PeerGroup } from '../types.js';

import type { QueryError } from '../../../../common/types/errors.js';
import type { FiscalDataRepository } from '../../../fiscal-data/core/ports.js';

export interface FindPeerEntitiesDeps {
  fiscalDataRepo: FiscalDataRepository;
}

/**
 * Peers share the entity's type and have a population within
 * ±PEER_POPULATION_RANGE of it, closest first. An entity without a known
 * population has no peers.
 */
export const findPeerEntities = async (
  deps: FindPeerEntitiesDeps,
  code: string
): Promise<Result<PeerGroup, QueryError>> => {
  const entityResult = await requireEntity(deps.fiscalDataRepo, code.trim());
  if (entityResult.isErr()) {
    return err(entityResult.error);
  }
  const entity = entityResult.value;
  const summary = {
    code: entity.code,
    name: entity.name,
    entityType: entity.entityType,
    county: entity.county,
    population: entity.population,
  };

  if (entity.population === null || entity.population <= 0) {
    return ok({ entity: summary, populationWindow: null, peers: [] });
  }

  const peersResult = await deps.fiscalDataRepo.findPeers({
    code: entity.code,
    population: entity.population,
    entityType: entity.entityType,
    populationRange: PEER_POPULATION_RANGE,
    limit: PEER_LIMIT,
  });
  if (peersResult.isErr()) {
    return err(peersResult.error);
  }

  return ok({
    entity: summary,
    populationWindow: {
      min: entity.population * (1 - PEER_POPULATION_RANGE),
      max: entity.population * (1 + PEER_POPULATION_RANGE),
    },
    peers: peersResult.value,
  });
};

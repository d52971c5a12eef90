/**
 * JSON views of entity results, shared by the REST routes and the MCP tools
 */

import { toAmount } from '../../../common/utils/amounts.js';

import type { EntityComparison, PeerGroup } from './types.js';
import type { EntityDetails, PeerEntity, RankedEntity } from '../../fiscal-data/core/types.js';

export const toEntityDetailsDto = (entity: EntityDetails) => ({
  code: entity.code,
  name: entity.name,
  entityType: entity.entityType,
  entityTypeCode: entity.entityTypeCode,
  county: entity.county,
  ceo: entity.ceo,
  cfo: entity.cfo,
  population: entity.population,
  assessedValue: toAmount(entity.assessedValue),
  fullTimeEmployees: entity.fullTimeEmployees,
  partTimeEmployees: entity.partTimeEmployees,
  homeRule: entity.homeRule,
  hasDebt: entity.hasDebt,
  hasBondedDebt: entity.hasBondedDebt,
});

export const toComparisonDto = (comparison: EntityComparison) => ({
  entities: comparison.entities.map((row) => ({
    code: row.code,
    name: row.name,
    entityType: row.entityType,
    county: row.county,
    population: row.population,
    assessedValue: toAmount(row.assessedValue),
    totalRevenue: row.totalRevenue.toNumber(),
    totalExpenditure: row.totalExpenditure.toNumber(),
    revenuePerCapita: toAmount(row.revenuePerCapita),
    expenditurePerCapita: toAmount(row.expenditurePerCapita),
  })),
  notFound: comparison.notFound,
});

export const toRankedEntityDto = (entity: RankedEntity) => ({
  rank: entity.rank,
  code: entity.code,
  name: entity.name,
  entityType: entity.entityType,
  county: entity.county,
  value: entity.value.toNumber(),
});

const toPeerEntityDto = (peer: PeerEntity) => ({
  code: peer.code,
  name: peer.name,
  entityType: peer.entityType,
  county: peer.county,
  population: peer.population,
  assessedValue: toAmount(peer.assessedValue),
  populationDifference: peer.populationDifference,
});

export const toPeerGroupDto = (group: PeerGroup) => ({
  entity: group.entity,
  populationWindow: group.populationWindow,
  peers: group.peers.map(toPeerEntityDto),
});

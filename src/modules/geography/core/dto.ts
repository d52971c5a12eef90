import { toAmount } from '../../../common/utils/amounts.js';

import type { CountyEntity, CountySummary } from '../../fiscal-data/core/types.js';

export const toCountyEntityDto = (entity: CountyEntity) => ({
  code: entity.code,
  name: entity.name,
  entityType: entity.entityType,
  county: entity.county,
  population: entity.population,
  assessedValue: toAmount(entity.assessedValue),
  homeRule: entity.homeRule,
});

export const toCountySummaryDto = (summary: CountySummary) => ({
  county: summary.county,
  entityCount: summary.entityCount,
  entityTypeCount: summary.entityTypeCount,
  totalPopulation: summary.totalPopulation,
  totalAssessedValue: summary.totalAssessedValue.toNumber(),
  totalFullTimeEmployees: summary.totalFullTimeEmployees,
  totalPartTimeEmployees: summary.totalPartTimeEmployees,
  homeRuleCount: summary.homeRuleCount,
  entitiesWithDebt: summary.entitiesWithDebt,
});

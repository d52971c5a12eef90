/**
 * Entities - Domain Types and limits
 */

import type {
  EntitySummary,
  PeerEntity,
  RankMetric,
  RankOrder,
} from '../../fiscal-data/core/types.js';
import type { Decimal } from 'decimal.js';

export const SEARCH_MIN_LENGTH = 2;
export const DEFAULT_SEARCH_LIMIT = 10;
export const MAX_SEARCH_LIMIT = 50;

export const MIN_COMPARE_CODES = 2;
export const MAX_COMPARE_CODES = 10;

export const DEFAULT_RANK_LIMIT = 10;
export const MAX_RANK_LIMIT = 50;

/** Peers are entities of the same type within ±25% of the population */
export const PEER_POPULATION_RANGE = 0.25;
export const PEER_LIMIT = 10;

export interface SearchEntitiesInput {
  query: string;
  limit?: number | undefined;
}

export interface RankEntitiesInput {
  metric: RankMetric;
  order?: RankOrder | undefined;
  entityType?: string | undefined;
  county?: string | undefined;
  limit?: number | undefined;
}

export interface EntityComparisonRow extends EntitySummary {
  population: number | null;
  assessedValue: Decimal | null;
  totalRevenue: Decimal;
  totalExpenditure: Decimal;
  revenuePerCapita: Decimal | null;
  expenditurePerCapita: Decimal | null;
}

export interface EntityComparison {
  entities: EntityComparisonRow[];
  /** Requested codes with no matching entity */
  notFound: string[];
}

export interface PeerGroup {
  entity: EntitySummary & { population: number | null };
  /** Population window searched; null when the entity has no population */
  populationWindow: { min: number; max: number } | null;
  peers: PeerEntity[];
}

/**
 * Entities Module - Public API
 *
 * Search, details, comparison, ranking and peer lookup for units of local
 * government.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  SearchEntitiesInput,
  RankEntitiesInput,
  EntityComparison,
  EntityComparisonRow,
  PeerGroup,
} from './core/types.js';

export {
  SEARCH_MIN_LENGTH,
  DEFAULT_SEARCH_LIMIT,
  MAX_SEARCH_LIMIT,
  MIN_COMPARE_CODES,
  MAX_COMPARE_CODES,
  DEFAULT_RANK_LIMIT,
  MAX_RANK_LIMIT,
  PEER_POPULATION_RANGE,
  PEER_LIMIT,
} from './core/types.js';

export {
  toEntityDetailsDto,
  toComparisonDto,
  toRankedEntityDto,
  toPeerGroupDto,
} from './core/dto.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export { searchEntities, type SearchEntitiesDeps } from './core/usecases/search-entities.js';
export { getEntity, type GetEntityDeps } from './core/usecases/get-entity.js';
export { compareEntities, type CompareEntitiesDeps } from './core/usecases/compare-entities.js';
export { rankEntities, type RankEntitiesDeps } from './core/usecases/rank-entities.js';
export {
  findPeerEntities,
  type FindPeerEntitiesDeps,
} from './core/usecases/find-peer-entities.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - REST Routes
// ─────────────────────────────────────────────────────────────────────────────

export { makeEntityRoutes, type MakeEntityRoutesDeps } from './shell/rest/routes.js';

/**
 * Geography Module - Public API
 */

export { toCountyEntityDto, toCountySummaryDto } from './core/dto.js';

export {
  getCountyEntities,
  type GetCountyEntitiesDeps,
  type GetCountyEntitiesInput,
} from './core/usecases/get-county-entities.js';
export { getCountySummary, type GetCountySummaryDeps } from './core/usecases/get-county-summary.js';

export { makeGeographyRoutes, type MakeGeographyRoutesDeps } from './shell/rest/routes.js';

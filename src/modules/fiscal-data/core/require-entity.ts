/**
 * Shared lookup for use cases that operate on a single entity.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createNotFoundError,
  type InfraError,
  type NotFoundError,
} from '../../../common/types/errors.js';

import type { FiscalDataRepository } from './ports.js';
import type { EntityDetails } from './types.js';

export const requireEntity = async (
  repo: FiscalDataRepository,
  code: string
): Promise<Result<EntityDetails, InfraError | NotFoundError>> => {
  const result = await repo.findEntityByCode(code);
  if (result.isErr()) {
    return err(result.error);
  }
  if (result.value === null) {
    return err(createNotFoundError('Entity', code));
  }
  return ok(result.value);
};

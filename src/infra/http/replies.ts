/**
 * Reply helpers shared by the REST route factories
 */

import { getHttpStatusForError, type QueryError } from '../../common/types/errors.js';

import type { FastifyReply } from 'fastify';

/**
 * Sends a failed use-case result as `{ ok: false, error, message }`.
 * Infrastructure failures are logged at error level, client errors at debug.
 */
export const sendQueryError = (reply: FastifyReply, error: QueryError) => {
  const status = getHttpStatusForError(error);

  if (status >= 500) {
    reply.log.error({ errorType: error.type, cause: error.cause }, error.message);
  } else {
    reply.log.debug({ errorType: error.type }, error.message);
  }

  return reply.status(status).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
};

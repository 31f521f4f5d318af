import { FastifyReply, FastifyRequest } from 'fastify';
import { DatabaseUnavailableError, DomainError } from '@lotledger/shared/src/utils/errors';

export function sendDomainError(reply: FastifyReply, error: DomainError) {
     return reply.code(error.statusCode).send({
          ...error.details,
          error: error.code,
          message: error.message,
     });
}

export function sendUnexpectedError(
     request: FastifyRequest,
     reply: FastifyReply,
     error: unknown,
     context: string
) {
     if (error instanceof DatabaseUnavailableError) {
          request.log.error({ err: error }, context);
          return reply.code(error.statusCode).send({
               error: 'DATABASE_UNAVAILABLE',
               message: error.outcomeUnknown
                    ? 'The connection was lost while committing; check the ledger before retrying'
                    : 'The database is temporarily unavailable, retry later',
               outcomeUnknown: error.outcomeUnknown,
          });
     }

     request.log.error({ err: error }, context);
     return reply.code(500).send({
          error: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
     });
}

import type { FastifyReply } from 'fastify';
import type { ServiceError, ServiceErrorCode } from '../../application/index.js';

export const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const STATUS_BY_CODE: Record<ServiceErrorCode, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
};

export function sendServiceError(reply: FastifyReply, error: ServiceError): FastifyReply {
  return reply.status(STATUS_BY_CODE[error.code]).send({ error });
}

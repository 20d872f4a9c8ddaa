import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

import { problemLogFields } from '../../lib/logger';
import { renderProblem, type ContentNegotiator } from '../../negotiation/negotiator';
import { ProblemDetails } from '../../problem/problem-details';
import { resolveErrorProblem } from '../error-mapping';
import { createValidationError } from '../http-problem-error';

export type FastifyProblemOptions = {
  negotiator: ContentNegotiator;
  fallbackStatus?: number;
};

export function sendProblem(
  reply: FastifyReply,
  problem: ProblemDetails,
  options: FastifyProblemOptions,
): FastifyReply {
  const response = renderProblem(options.negotiator, problem, reply.request.headers.accept, {
    fallbackStatus: options.fallbackStatus,
  });

  return reply.code(response.status).type(response.contentType).send(response.body);
}

export function registerProblemErrorHandler(app: FastifyInstance, options: FastifyProblemOptions) {
  app.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    if (error.validation) {
      request.log.warn({ err: error }, 'Request validation failed');
      return sendProblem(
        reply,
        createValidationError('The request payload or parameters failed validation.', error.validation)
          .problem,
        options,
      );
    }

    const { problem, handled } = resolveErrorProblem(error);
    if (handled) {
      request.log.warn({ err: error, ...problemLogFields(problem) }, 'Handled application error');
    } else {
      request.log.error({ err: error }, 'Unhandled error');
    }

    return sendProblem(reply, problem, options);
  });

  app.setNotFoundHandler((request, reply) => {
    sendProblem(
      reply,
      ProblemDetails.fromStatus(404).withDetail(`Route ${request.method} ${request.url} was not found`),
      options,
    );
  });
}

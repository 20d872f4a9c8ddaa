import type { ErrorRequestHandler, RequestHandler, Response } from 'express';

import { problemLogFields, silentLogger, type AppLogger } from '../../lib/logger';
import { renderProblem, type ContentNegotiator } from '../../negotiation/negotiator';
import { ProblemDetails } from '../../problem/problem-details';
import { resolveErrorProblem } from '../error-mapping';

export type ExpressProblemOptions = {
  negotiator: ContentNegotiator;
  fallbackStatus?: number;
  logger?: AppLogger;
};

export function sendProblem(
  res: Response,
  problem: ProblemDetails,
  options: ExpressProblemOptions,
): Response {
  const response = renderProblem(options.negotiator, problem, res.req.headers.accept, {
    fallbackStatus: options.fallbackStatus,
  });

  return res.status(response.status).type(response.contentType).send(response.body);
}

export function problemErrorHandler(options: ExpressProblemOptions): ErrorRequestHandler {
  const logger = options.logger ?? silentLogger;

  return (error: unknown, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const { problem, handled } = resolveErrorProblem(error);
    if (handled) {
      logger.warn({ err: error, ...problemLogFields(problem) }, 'Handled application error');
    } else {
      logger.error({ err: error, method: req.method, url: req.originalUrl }, 'Unhandled error');
    }

    sendProblem(res, problem, options);
  };
}

export function problemNotFoundHandler(options: ExpressProblemOptions): RequestHandler {
  return (req, res) => {
    sendProblem(
      res,
      ProblemDetails.fromStatus(404).withDetail(`Route ${req.method} ${req.originalUrl} was not found`),
      options,
    );
  };
}

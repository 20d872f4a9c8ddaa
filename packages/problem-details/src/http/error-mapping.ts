import { isProblemDetailsError } from '../problem/errors';
import { ProblemDetails } from '../problem/problem-details';
import { createBadRequestError, createInternalError, HttpProblemError } from './http-problem-error';

export type ResolvedProblem = {
  problem: ProblemDetails;
  /** True for errors the application raised on purpose or the client caused. */
  handled: boolean;
};

function readClientErrorStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null) {
    return null;
  }

  const status =
    'statusCode' in error ? error.statusCode : 'status' in error ? error.status : undefined;

  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

/**
 * Maps anything thrown by a request handler onto the problem to respond with.
 * Unknown errors become an opaque 500 problem.
 */
export function resolveErrorProblem(error: unknown): ResolvedProblem {
  if (error instanceof HttpProblemError) {
    return { problem: error.problem, handled: true };
  }

  if (isProblemDetailsError(error, 'MalformedDocument') || isProblemDetailsError(error, 'TypeMismatch')) {
    return { problem: createBadRequestError(error.message, error).problem, handled: true };
  }

  const clientStatus = readClientErrorStatus(error);
  if (clientStatus !== null) {
    const problem = ProblemDetails.fromStatus(clientStatus);
    return {
      problem: error instanceof Error ? problem.withDetail(error.message) : problem,
      handled: true,
    };
  }

  return { problem: createInternalError().problem, handled: false };
}

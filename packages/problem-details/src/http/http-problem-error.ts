import { ProblemDetails } from '../problem/problem-details';

export type HttpProblemErrorOptions = {
  cause?: unknown;
};

export class HttpProblemError extends Error {
  constructor(
    public readonly problem: ProblemDetails,
    options?: HttpProblemErrorOptions,
  ) {
    super(problem.detail ?? problem.title ?? problem.problemType, options);
    this.name = 'HttpProblemError';
  }
}

export function createNotFoundError(
  resource: string,
  extras?: Record<string, unknown>,
  cause?: unknown,
): HttpProblemError {
  return new HttpProblemError(
    ProblemDetails.fromStatus(404)
      .withDetail(`${resource} was not found.`)
      .withExtensions(extras ?? {}),
    cause ? { cause } : undefined,
  );
}

export function createValidationError(
  detail: string,
  errors?: unknown,
  cause?: unknown,
): HttpProblemError {
  const problem = ProblemDetails.create(422).withTitle('Validation Failed').withDetail(detail);

  return new HttpProblemError(
    errors === undefined ? problem : problem.withExtension('errors', errors),
    cause ? { cause } : undefined,
  );
}

export function createBadRequestError(detail: string, cause?: unknown): HttpProblemError {
  return new HttpProblemError(
    ProblemDetails.fromStatus(400).withDetail(detail),
    cause ? { cause } : undefined,
  );
}

export function createInternalError(detail?: string, cause?: unknown): HttpProblemError {
  return new HttpProblemError(
    ProblemDetails.fromStatus(500).withDetail(detail ?? 'An unexpected error occurred.'),
    cause ? { cause } : undefined,
  );
}

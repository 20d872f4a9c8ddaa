import { renderProblem, type ContentNegotiator } from '../../negotiation/negotiator';
import type { ProblemDetails } from '../../problem/problem-details';

export type FetchProblemOptions = {
  negotiator: ContentNegotiator;
  fallbackStatus?: number;
};

/**
 * Builds a Fetch API `Response` for hosts that speak `Request`/`Response`
 * (route handlers, edge-style servers, undici).
 */
export function toProblemResponse(
  problem: ProblemDetails,
  request: Request | null,
  options: FetchProblemOptions,
): Response {
  const response = renderProblem(options.negotiator, problem, request?.headers.get('accept'), {
    fallbackStatus: options.fallbackStatus,
  });

  return new Response(response.body.toString('utf8'), {
    status: response.status,
    headers: { 'content-type': response.contentType },
  });
}

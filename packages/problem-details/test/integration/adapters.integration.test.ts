import express from 'express';
import Fastify from 'fastify';
import request from 'supertest';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import {
  problemErrorHandler,
  problemNotFoundHandler,
  sendProblem as sendExpressProblem,
} from '../../src/http/adapters/express';
import { registerProblemErrorHandler, sendProblem } from '../../src/http/adapters/fastify';
import { toProblemResponse } from '../../src/http/adapters/fetch';
import { createNotFoundError } from '../../src/http/http-problem-error';
import { createNegotiator } from '../../src/negotiation/create-negotiator';
import { ProblemDetails } from '../../src/problem/problem-details';
import { createCaptureLogger } from '../utils/capture-logger';

const XML = 'application/problem+xml';
const JSON_TYPE = 'application/problem+json';

const VENUE_JSON = '{"title":"Not Found","status":404,"detail":"Venue was not found.","venueId":"v-1"}';
const VENUE_XML =
  '<problem xmlns="urn:ietf:rfc:7807"><title>Not Found</title><status>404</status>' +
  '<detail>Venue was not found.</detail><venueId>v-1</venueId></problem>';
const INTERNAL_JSON = '{"title":"Internal Server Error","status":500,"detail":"An unexpected error occurred."}';

const negotiator = createNegotiator({ json: true, xml: true });

const outOfCredit = ProblemDetails.fromStatus(403)
  .withType('https://example.com/probs/out-of-credit')
  .withExtension('balance', 30);

describe('fastify adapter', () => {
  const app = Fastify({ logger: false });

  beforeAll(async () => {
    registerProblemErrorHandler(app, { negotiator });

    app.get<{ Params: { id: string } }>('/venues/:id', async (req) => {
      throw createNotFoundError('Venue', { venueId: req.params.id });
    });
    app.get('/boom', async () => {
      throw new Error('database offline');
    });
    app.get('/credit', async (_req, reply) => sendProblem(reply, outOfCredit, { negotiator }));
    app.post(
      '/songs',
      {
        schema: {
          body: {
            type: 'object',
            required: ['title'],
            properties: { title: { type: 'string' } },
          },
        },
      },
      async () => ({ ok: true }),
    );

    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('renders thrown problems as JSON by default', async () => {
    const response = await app.inject({ method: 'GET', url: '/venues/v-1' });

    expect(response.statusCode).toBe(404);
    expect(response.headers['content-type']).toBe(JSON_TYPE);
    expect(response.body).toBe(VENUE_JSON);
  });

  it('renders XML when the client prefers it', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/venues/v-1',
      headers: { accept: `${XML};q=0.9, ${JSON_TYPE};q=0.5` },
    });

    expect(response.statusCode).toBe(404);
    expect(response.headers['content-type']).toBe(XML);
    expect(response.body).toBe(VENUE_XML);
  });

  it('hides unexpected errors behind an internal problem', async () => {
    const response = await app.inject({ method: 'GET', url: '/boom' });

    expect(response.statusCode).toBe(500);
    expect(response.body).toBe(INTERNAL_JSON);
  });

  it('sends problems built inside a handler', async () => {
    const response = await app.inject({ method: 'GET', url: '/credit' });

    expect(response.statusCode).toBe(403);
    expect(response.body).toBe(
      '{"type":"https://example.com/probs/out-of-credit","title":"Forbidden","status":403,"balance":30}',
    );
  });

  it('reports schema validation failures', async () => {
    const response = await app.inject({ method: 'POST', url: '/songs', payload: {} });

    expect(response.statusCode).toBe(422);
    expect(response.json()).toMatchObject({
      title: 'Validation Failed',
      status: 422,
      detail: 'The request payload or parameters failed validation.',
    });
    expect(response.json().errors).toHaveLength(1);
  });

  it('reports unknown routes', async () => {
    const response = await app.inject({ method: 'GET', url: '/missing' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      title: 'Not Found',
      status: 404,
      detail: 'Route GET /missing was not found',
    });
  });
});

describe('express adapter', () => {
  const { logger, entries } = createCaptureLogger('warn');
  const options = { negotiator, logger };
  const app = express();

  app.get('/venues/:id', (req) => {
    throw createNotFoundError('Venue', { venueId: req.params.id });
  });
  app.get('/boom', () => {
    throw new Error('database offline');
  });
  app.get('/credit', (_req, res) => {
    sendExpressProblem(res, outOfCredit, options);
  });
  app.use(problemNotFoundHandler(options));
  app.use(problemErrorHandler(options));

  it('renders thrown problems as JSON by default', async () => {
    const response = await request(app).get('/venues/v-1');

    expect(response.status).toBe(404);
    expect(response.headers['content-type']).toBe(JSON_TYPE);
    expect(response.text).toBe(VENUE_JSON);
  });

  it('renders XML when the client prefers it', async () => {
    const response = await request(app).get('/venues/v-1').set('Accept', XML);

    expect(response.status).toBe(404);
    expect(response.headers['content-type']).toBe(XML);
    expect(response.text).toBe(VENUE_XML);
  });

  it('logs unexpected errors and hides them behind an internal problem', async () => {
    entries.length = 0;

    const response = await request(app).get('/boom');

    expect(response.status).toBe(500);
    expect(response.text).toBe(INTERNAL_JSON);
    expect(entries.map((entry) => [entry.level, entry.msg, entry.url])).toEqual([
      ['error', 'Unhandled error', '/boom'],
    ]);
  });

  it('sends problems built inside a handler', async () => {
    const response = await request(app).get('/credit').set('Accept', XML);

    expect(response.status).toBe(403);
    expect(response.text).toBe(
      '<problem xmlns="urn:ietf:rfc:7807"><type>https://example.com/probs/out-of-credit</type>' +
        '<title>Forbidden</title><status>403</status><balance>30</balance></problem>',
    );
  });

  it('reports unknown routes', async () => {
    const response = await request(app).get('/missing?page=2');

    expect(response.status).toBe(404);
    expect(response.text).toBe('{"title":"Not Found","status":404,"detail":"Route GET /missing?page=2 was not found"}');
  });
});

describe('fetch adapter', () => {
  it('negotiates from the request Accept header', async () => {
    const response = toProblemResponse(
      ProblemDetails.create(404).withTitle('Not Found'),
      new Request('http://localhost/venues/v-1', { headers: { accept: XML } }),
      { negotiator },
    );

    expect(response.status).toBe(404);
    expect(response.headers.get('content-type')).toBe(XML);
    expect(await response.text()).toBe(
      '<problem xmlns="urn:ietf:rfc:7807"><title>Not Found</title><status>404</status></problem>',
    );
  });

  it('falls back to JSON and the fallback status without a request', async () => {
    const response = toProblemResponse(ProblemDetails.create().withTitle('Unknown'), null, {
      negotiator,
      fallbackStatus: 502,
    });

    expect(response.status).toBe(502);
    expect(response.headers.get('content-type')).toBe(JSON_TYPE);
    expect(await response.text()).toBe('{"title":"Unknown"}');
  });
});

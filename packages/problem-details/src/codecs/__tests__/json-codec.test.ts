import { describe, expect, it } from 'vitest';

import { isProblemDetailsError } from '../../problem/errors';
import { ProblemDetails } from '../../problem/problem-details';
import { JsonProblemCodec } from '../json-codec';

describe('JsonProblemCodec', () => {
  const codec = new JsonProblemCodec();

  it('advertises the problem+json media type', () => {
    expect(codec.format).toBe('json');
    expect(codec.contentType).toBe('application/problem+json');
    expect(codec.mediaTypes).toEqual(['application/problem+json', 'application/json']);
  });

  it('writes fixed fields then extensions in insertion order', () => {
    const problem = ProblemDetails.create(404)
      .withExtension('trace_id', 'abc123')
      .withTitle('Not Found');

    expect(codec.encode(problem).toString('utf8')).toBe(
      '{"title":"Not Found","status":404,"trace_id":"abc123"}',
    );
  });

  it('decodes its own output back to an equal problem', () => {
    const problem = ProblemDetails.fromFields({ title: 'Not Found', status: 404 }, { trace_id: 'abc123' });

    const decoded = codec.decode(codec.encode(problem));

    expect(decoded.equals(problem)).toBe(true);
    expect(decoded.extensions.get('trace_id')).toBe('abc123');
  });

  it('round-trips every fixed field', () => {
    const problem = ProblemDetails.create(403)
      .withType('https://example.com/probs/out-of-credit')
      .withTitle('You do not have enough credit.')
      .withDetail('Your current balance is 30, but that costs "50".')
      .withInstance('/account/12345/msgs/abc');

    const decoded = codec.decode(codec.encode(problem));

    expect(decoded.fields).toEqual(problem.fields);
    expect(decoded.extensions.size).toBe(0);
  });

  it('omits absent fields instead of writing null', () => {
    expect(codec.serialize(ProblemDetails.create())).toBe('{}');
    expect(codec.serialize(ProblemDetails.create().withDetail('only detail'))).toBe(
      '{"detail":"only detail"}',
    );
  });

  it('serializes a problem without extensions like one with an empty store', () => {
    const plain = ProblemDetails.fromStatus(400);
    const emptyRecord = ProblemDetails.fromFields({ title: 'Bad Request', status: 400 }, {});

    expect(codec.serialize(emptyRecord)).toBe(codec.serialize(plain));
    expect(codec.serialize(plain)).toBe('{"title":"Bad Request","status":400}');
  });

  it('keeps integer-like extension names in insertion position', () => {
    const problem = ProblemDetails.create().withExtension('b', 1).withExtension('10', 2);

    expect(codec.serialize(problem)).toBe('{"b":1,"10":2}');
  });

  it('encodes structured extension values with JSON rules', () => {
    const problem = ProblemDetails.create(403).withExtensions({
      balance: 30,
      accounts: ['/account/12345', '/account/67890'],
      meta: { retry: false, at: new Date('2024-01-02T03:04:05.000Z') },
    });

    expect(codec.serialize(problem)).toBe(
      '{"status":403,"balance":30,"accounts":["/account/12345","/account/67890"],' +
        '"meta":{"retry":false,"at":"2024-01-02T03:04:05.000Z"}}',
    );
  });

  it('maps unknown members to extensions in document order', () => {
    const problem = codec.decode('{"zeta":{"n":[1,true]},"title":"T","alpha":null}');

    expect(problem.title).toBe('T');
    expect(problem.extensions.names()).toEqual(['zeta', 'alpha']);
    expect(problem.extensions.get('zeta')).toEqual({ n: [1, true] });
    expect(problem.extensions.get('alpha')).toBeNull();
  });

  it('treats null fixed fields as absent', () => {
    const problem = codec.decode('{"type":null,"status":410}');

    expect(problem.fields).toEqual({ status: 410 });
    expect(problem.problemType).toBe('about:blank');
  });

  it.each([
    ['not json', 'Malformed problem document: body is not valid JSON.'],
    ['[1,2]', 'Malformed problem document: top-level JSON value must be an object.'],
    ['"problem"', 'Malformed problem document: top-level JSON value must be an object.'],
    ['null', 'Malformed problem document: top-level JSON value must be an object.'],
  ])('rejects %s as a malformed document', (body, message) => {
    try {
      codec.decode(body);
      expect.unreachable();
    } catch (error) {
      expect(isProblemDetailsError(error, 'MalformedDocument')).toBe(true);
      expect(error).toHaveProperty('message', message);
    }
  });

  it.each([
    ['{"status":"404"}', 'status'],
    ['{"status":404.5}', 'status'],
    ['{"status":-1}', 'status'],
    ['{"title":42}', 'title'],
    ['{"type":["a"]}', 'type'],
    ['{"instance":{}}', 'instance'],
  ])('rejects %s with a type mismatch', (body, field) => {
    const result = codec.safeDecode(body);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('TypeMismatch');
      expect(result.error.message).toContain(`"${field}"`);
    }
  });

  it('decodes buffers and reports success from safeDecode', () => {
    const result = codec.safeDecode(Buffer.from('{"title":"Gone","status":410}', 'utf8'));

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.problem.fields).toEqual({ title: 'Gone', status: 410 });
    }
  });
});

import { createMalformedDocument } from '../problem/errors';
import { ExtensionMembers } from '../problem/extension-members';
import {
  fixedFieldEntries,
  isReservedField,
  readProblemField,
  type ProblemFields,
} from '../problem/fields';
import { toJsonValue, type JsonValue } from '../problem/json-value';
import { ProblemDetails } from '../problem/problem-details';
import { BaseProblemCodec } from './codec';

export const PROBLEM_JSON_CONTENT_TYPE = 'application/problem+json';

export class JsonProblemCodec extends BaseProblemCodec {
  readonly format = 'json';
  readonly contentType = PROBLEM_JSON_CONTENT_TYPE;
  readonly mediaTypes = [PROBLEM_JSON_CONTENT_TYPE, 'application/json'];

  // Members are written one by one so integer-like extension names keep
  // their insertion position.
  serialize(problem: ProblemDetails): string {
    const members: Array<[string, JsonValue]> = fixedFieldEntries(problem);
    for (const member of problem.extensions) {
      members.push([member.name, member.json]);
    }

    const body = members.map(([name, value]) => `${JSON.stringify(name)}:${JSON.stringify(value)}`);
    return `{${body.join(',')}}`;
  }

  parse(text: string): ProblemDetails {
    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      throw createMalformedDocument('body is not valid JSON', error);
    }

    if (document === null || typeof document !== 'object' || Array.isArray(document)) {
      throw createMalformedDocument('top-level JSON value must be an object');
    }

    const fields: ProblemFields = {};
    const extensions: Array<[string, JsonValue]> = [];
    for (const [name, value] of Object.entries(document)) {
      if (isReservedField(name)) {
        readProblemField(fields, name, value);
      } else {
        extensions.push([name, toJsonValue(value)]);
      }
    }

    return ProblemDetails.fromFields(fields, ExtensionMembers.from(extensions));
  }
}

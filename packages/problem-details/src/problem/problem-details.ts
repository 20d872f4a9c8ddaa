import { STATUS_CODES } from 'http';

import { ExtensionMembers } from './extension-members';
import { assertStatus, BLANK_PROBLEM_TYPE, fixedFieldEntries, type ProblemFields } from './fields';
import { setMember, type JsonObject } from './json-value';

export type ExtensionInput = ExtensionMembers | Record<string, unknown>;

function toExtensionMembers(input: ExtensionInput): ExtensionMembers {
  return input instanceof ExtensionMembers ? input : ExtensionMembers.from(Object.entries(input));
}

/**
 * One RFC 9457 problem details occurrence. Instances are frozen; every
 * `with*` method returns a new value.
 *
 * ```ts
 * const problem = ProblemDetails.fromStatus(403)
 *   .withType('https://example.com/probs/out-of-credit')
 *   .withDetail('Your current balance is 30, but that costs 50.')
 *   .withExtension('balance', 30);
 * ```
 */
export class ProblemDetails {
  readonly type?: string;
  readonly title?: string;
  readonly status?: number;
  readonly detail?: string;
  readonly instance?: string;

  private constructor(
    fields: ProblemFields,
    readonly extensions: ExtensionMembers,
  ) {
    if (fields.type !== undefined) this.type = fields.type;
    if (fields.title !== undefined) this.title = fields.title;
    if (fields.status !== undefined) this.status = assertStatus(fields.status);
    if (fields.detail !== undefined) this.detail = fields.detail;
    if (fields.instance !== undefined) this.instance = fields.instance;
    Object.freeze(this);
  }

  static create(status?: number): ProblemDetails {
    return new ProblemDetails(status === undefined ? {} : { status }, ExtensionMembers.empty);
  }

  /**
   * Sets the status and uses its standard reason phrase as the title.
   */
  static fromStatus(status: number): ProblemDetails {
    const title = STATUS_CODES[status];
    return new ProblemDetails(title ? { status, title } : { status }, ExtensionMembers.empty);
  }

  static fromFields(fields: ProblemFields, extensions?: ExtensionInput): ProblemDetails {
    return new ProblemDetails(
      fields,
      extensions ? toExtensionMembers(extensions) : ExtensionMembers.empty,
    );
  }

  /** Effective problem type: `about:blank` when no type was set. */
  get problemType(): string {
    return this.type ?? BLANK_PROBLEM_TYPE;
  }

  get fields(): ProblemFields {
    const { type, title, status, detail, instance } = this;
    return {
      ...(type !== undefined ? { type } : {}),
      ...(title !== undefined ? { title } : {}),
      ...(status !== undefined ? { status } : {}),
      ...(detail !== undefined ? { detail } : {}),
      ...(instance !== undefined ? { instance } : {}),
    };
  }

  withType(type: string): ProblemDetails {
    return new ProblemDetails({ ...this.fields, type }, this.extensions);
  }

  withTitle(title: string): ProblemDetails {
    return new ProblemDetails({ ...this.fields, title }, this.extensions);
  }

  withStatus(status: number): ProblemDetails {
    return new ProblemDetails({ ...this.fields, status }, this.extensions);
  }

  withDetail(detail: string): ProblemDetails {
    return new ProblemDetails({ ...this.fields, detail }, this.extensions);
  }

  withInstance(instance: string): ProblemDetails {
    return new ProblemDetails({ ...this.fields, instance }, this.extensions);
  }

  withExtension(name: string, value: unknown): ProblemDetails {
    return new ProblemDetails(this.fields, this.extensions.with(name, value));
  }

  withExtensions(extensions: Record<string, unknown>): ProblemDetails {
    let store = this.extensions;
    for (const [name, value] of Object.entries(extensions)) {
      store = store.with(name, value);
    }

    return new ProblemDetails(this.fields, store);
  }

  equals(other: ProblemDetails): boolean {
    return (
      this.type === other.type &&
      this.title === other.title &&
      this.status === other.status &&
      this.detail === other.detail &&
      this.instance === other.instance &&
      this.extensions.equals(other.extensions)
    );
  }

  toJSON(): JsonObject {
    const document: JsonObject = {};
    for (const [name, value] of fixedFieldEntries(this)) {
      document[name] = value;
    }

    for (const member of this.extensions) {
      setMember(document, member.name, member.json);
    }

    return document;
  }
}

import {
  createDuplicateExtensionKey,
  createInvalidExtensionName,
  createReservedFieldCollision,
  createUnserializableValue,
} from './errors';
import { isReservedField } from './fields';
import {
  freezeValue,
  jsonToXmlValue,
  jsonValueEquals,
  toJsonValue,
  toXmlValue,
  type JsonValue,
  type XmlValue,
} from './json-value';

/**
 * Capability for extension values that control their own wire encoding.
 * Values without it are encoded with standard JSON rules, and their XML form
 * is derived from that JSON encoding.
 */
export interface ProblemExtension {
  toProblemJson(): JsonValue;
  toProblemXml?(): XmlValue;
}

export type ExtensionMember = {
  readonly name: string;
  readonly value: unknown;
  readonly json: JsonValue;
  readonly xml: XmlValue;
};

export function isProblemExtension(value: unknown): value is ProblemExtension {
  return (
    typeof value === 'object' &&
    value !== null &&
    'toProblemJson' in value &&
    typeof value.toProblemJson === 'function'
  );
}

function captureMember(name: string, value: unknown): ExtensionMember {
  try {
    const json = toJsonValue(isProblemExtension(value) ? value.toProblemJson() : value);
    const xml =
      isProblemExtension(value) && value.toProblemXml
        ? toXmlValue(value.toProblemXml())
        : jsonToXmlValue(json);

    return Object.freeze({ name, value, json: freezeValue(json), xml: freezeValue(xml) });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw createUnserializableValue(name, reason, error);
  }
}

export class ExtensionMembers implements Iterable<ExtensionMember> {
  static readonly empty = new ExtensionMembers([]);

  private readonly members: ReadonlyMap<string, ExtensionMember>;

  private constructor(members: readonly ExtensionMember[]) {
    this.members = new Map(members.map((member) => [member.name, member]));
    Object.freeze(this);
  }

  static from(entries: Iterable<readonly [string, unknown]>): ExtensionMembers {
    let store = ExtensionMembers.empty;
    for (const [name, value] of entries) {
      store = store.with(name, value);
    }

    return store;
  }

  get size(): number {
    return this.members.size;
  }

  with(name: string, value: unknown): ExtensionMembers {
    if (name.length === 0) {
      throw createInvalidExtensionName();
    }

    if (isReservedField(name)) {
      throw createReservedFieldCollision(name);
    }

    if (this.members.has(name)) {
      throw createDuplicateExtensionKey(name);
    }

    return new ExtensionMembers([...this.members.values(), captureMember(name, value)]);
  }

  has(name: string): boolean {
    return this.members.has(name);
  }

  get(name: string): unknown {
    return this.members.get(name)?.value;
  }

  getMember(name: string): ExtensionMember | undefined {
    return this.members.get(name);
  }

  names(): string[] {
    return [...this.members.keys()];
  }

  [Symbol.iterator](): Iterator<ExtensionMember> {
    return this.members.values();
  }

  equals(other: ExtensionMembers): boolean {
    if (other.size !== this.size) {
      return false;
    }

    const theirs = [...other];
    return [...this].every((member, index) => {
      const candidate = theirs[index];
      return (
        candidate !== undefined &&
        candidate.name === member.name &&
        jsonValueEquals(candidate.json, member.json)
      );
    });
  }
}

export type JsonPrimitive = null | boolean | number | string;
export type JsonObject = { [member: string]: JsonValue };
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

/**
 * Generic XML tree: text content, a list rendered as `<i>` items, or nested
 * elements keyed by name.
 */
export type XmlValue = string | XmlValue[] | { [element: string]: XmlValue };

export function isJsonObject(value: JsonValue): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// Assigning through defineProperty keeps a "__proto__" member an own property.
export function setMember<T>(target: { [member: string]: T }, name: string, value: T) {
  Object.defineProperty(target, name, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Converts an arbitrary value with the same rules `JSON.stringify` applies.
 * Throws a `TypeError` for values that have no JSON representation.
 */
export function toJsonValue(value: unknown): JsonValue {
  const converted = convert(value, new Set());
  if (converted === undefined) {
    throw new TypeError(`a ${typeof value} has no JSON representation`);
  }

  return converted;
}

function convert(value: unknown, ancestors: Set<object>): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === 'bigint') {
    throw new TypeError('a bigint has no JSON representation');
  }

  if (typeof value !== 'object') {
    return undefined;
  }

  if ('toJSON' in value && typeof value.toJSON === 'function') {
    const replaced: unknown = value.toJSON();
    return convert(replaced, ancestors);
  }

  if (ancestors.has(value)) {
    throw new TypeError('circular structures have no JSON representation');
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => convert(item, ancestors) ?? null);
    }

    const object: JsonObject = {};
    for (const [name, member] of Object.entries(value)) {
      const converted = convert(member, ancestors);
      if (converted !== undefined) {
        setMember(object, name, converted);
      }
    }

    return object;
  } finally {
    ancestors.delete(value);
  }
}

/**
 * Copies a caller-supplied XML tree, rejecting anything that is not text, a
 * list or an element map.
 */
export function toXmlValue(value: unknown): XmlValue {
  return convertXml(value, new Set());
}

function convertXml(value: unknown, ancestors: Set<object>): XmlValue {
  if (typeof value === 'string') {
    return value;
  }

  if (typeof value !== 'object' || value === null) {
    throw new TypeError(`a ${value === null ? 'null' : typeof value} has no XML representation`);
  }

  if (ancestors.has(value)) {
    throw new TypeError('circular structures have no XML representation');
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => convertXml(item, ancestors));
    }

    const element: { [name: string]: XmlValue } = {};
    for (const [name, member] of Object.entries(value)) {
      setMember(element, name, convertXml(member, ancestors));
    }

    return element;
  } finally {
    ancestors.delete(value);
  }
}

export function freezeValue<T extends JsonValue | XmlValue>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const member of Object.values(value)) {
      freezeValue(member);
    }

    Object.freeze(value);
  }

  return value;
}

export function jsonToXmlValue(value: JsonValue): XmlValue {
  if (value === null) {
    return '';
  }

  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => jsonToXmlValue(item));
  }

  const element: { [name: string]: XmlValue } = {};
  for (const [name, member] of Object.entries(value)) {
    setMember(element, name, jsonToXmlValue(member));
  }

  return element;
}

export function jsonValueEquals(left: JsonValue, right: JsonValue): boolean {
  if (left === right) {
    return true;
  }

  if (Array.isArray(left) || Array.isArray(right)) {
    return (
      Array.isArray(left) &&
      Array.isArray(right) &&
      left.length === right.length &&
      left.every((item, index) => jsonValueEquals(item, right[index]))
    );
  }

  if (!isJsonObject(left) || !isJsonObject(right)) {
    return false;
  }

  const leftNames = Object.keys(left);
  if (leftNames.length !== Object.keys(right).length) {
    return false;
  }

  return leftNames.every(
    (name) => Object.hasOwn(right, name) && jsonValueEquals(left[name], right[name]),
  );
}

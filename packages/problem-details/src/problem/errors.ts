export type ProblemDetailsErrorKind =
  | 'ReservedFieldCollision'
  | 'DuplicateExtensionKey'
  | 'InvalidExtensionName'
  | 'UnserializableValue'
  | 'MalformedDocument'
  | 'TypeMismatch'
  | 'NoCodecAvailable';

export type ProblemDetailsErrorOptions = {
  cause?: unknown;
};

export class ProblemDetailsError extends Error {
  constructor(
    public readonly kind: ProblemDetailsErrorKind,
    message: string,
    options?: ProblemDetailsErrorOptions,
  ) {
    super(message, options);
    this.name = 'ProblemDetailsError';
  }
}

export function isProblemDetailsError(
  error: unknown,
  kind?: ProblemDetailsErrorKind,
): error is ProblemDetailsError {
  return error instanceof ProblemDetailsError && (kind === undefined || error.kind === kind);
}

export function createReservedFieldCollision(name: string): ProblemDetailsError {
  return new ProblemDetailsError(
    'ReservedFieldCollision',
    `Extension member "${name}" collides with a reserved problem details field.`,
  );
}

export function createDuplicateExtensionKey(name: string): ProblemDetailsError {
  return new ProblemDetailsError(
    'DuplicateExtensionKey',
    `Extension member "${name}" has already been set.`,
  );
}

export function createInvalidExtensionName(): ProblemDetailsError {
  return new ProblemDetailsError('InvalidExtensionName', 'Extension member names must not be empty.');
}

export function createUnserializableValue(name: string, reason: string, cause?: unknown) {
  return new ProblemDetailsError(
    'UnserializableValue',
    `Extension member "${name}" cannot be serialized: ${reason}.`,
    cause ? { cause } : undefined,
  );
}

export function createMalformedDocument(detail: string, cause?: unknown): ProblemDetailsError {
  return new ProblemDetailsError(
    'MalformedDocument',
    `Malformed problem document: ${detail}.`,
    cause ? { cause } : undefined,
  );
}

export function createTypeMismatch(field: string, expected: string, cause?: unknown) {
  return new ProblemDetailsError(
    'TypeMismatch',
    `Problem field "${field}" must be ${expected}.`,
    cause ? { cause } : undefined,
  );
}

export function createNoCodecAvailable(): ProblemDetailsError {
  return new ProblemDetailsError(
    'NoCodecAvailable',
    'No problem details format is enabled; enable at least one of json or xml.',
  );
}

export { ProblemDetails, type ExtensionInput } from './problem/problem-details';
export {
  ExtensionMembers,
  isProblemExtension,
  type ExtensionMember,
  type ProblemExtension,
} from './problem/extension-members';
export {
  BLANK_PROBLEM_TYPE,
  RESERVED_FIELDS,
  isReservedField,
  type ProblemFields,
  type ReservedField,
} from './problem/fields';
export type { JsonObject, JsonPrimitive, JsonValue, XmlValue } from './problem/json-value';
export {
  ProblemDetailsError,
  isProblemDetailsError,
  type ProblemDetailsErrorKind,
} from './problem/errors';

export type { CodecOptions, DecodeResult, ProblemCodec, ProblemFormat } from './codecs/codec';
export { BaseProblemCodec } from './codecs/codec';
export { JsonProblemCodec, PROBLEM_JSON_CONTENT_TYPE } from './codecs/json-codec';
export {
  XmlProblemCodec,
  PROBLEM_XML_CONTENT_TYPE,
  PROBLEM_XML_NAMESPACE,
  isXmlElementName,
} from './codecs/xml-codec';

export {
  parseAcceptHeader,
  toPreferences,
  type MediaRangePreference,
  type PreferenceSignal,
} from './negotiation/accept';
export {
  ContentNegotiator,
  DEFAULT_FALLBACK_STATUS,
  renderProblem,
  type Negotiation,
  type NegotiatorOptions,
  type ProblemResponse,
  type RenderOptions,
} from './negotiation/negotiator';
export {
  DEFAULT_FORMATS,
  createCodecs,
  createNegotiator,
  createNegotiatorFromConfig,
  type FormatSelection,
} from './negotiation/create-negotiator';

export {
  HttpProblemError,
  createBadRequestError,
  createInternalError,
  createNotFoundError,
  createValidationError,
} from './http/http-problem-error';
export { resolveErrorProblem, type ResolvedProblem } from './http/error-mapping';

export { getConfig, loadConfig, resetConfigCache, type AppConfig } from './config';
export { createLogger, problemLogFields, silentLogger, type AppLogger } from './lib/logger';
export { sanitizeLogValue } from './lib/log-sanitizer';

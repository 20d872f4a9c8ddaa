import type { ProblemCodec, ProblemFormat } from '../codecs/codec';
import { silentLogger, type AppLogger } from '../lib/logger';
import { createNoCodecAvailable } from '../problem/errors';
import { assertResponseStatus, responseStatusSchema } from '../problem/fields';
import type { ProblemDetails } from '../problem/problem-details';
import { toPreferences, type MediaRangePreference, type PreferenceSignal } from './accept';

export const DEFAULT_FALLBACK_STATUS = 500;

// Lower wins ties between equally weighted formats.
const FORMAT_PRIORITY: Record<ProblemFormat, number> = {
  json: 0,
  xml: 1,
};

const EXACT_MATCH = 3;
const TYPE_WILDCARD_MATCH = 2;
const FULL_WILDCARD_MATCH = 1;

export type NegotiatorOptions = {
  logger?: AppLogger;
  fallbackStatus?: number;
};

export type Negotiation = {
  codec: ProblemCodec;
  quality: number;
  /** False when no preference matched and the default codec was used. */
  matched: boolean;
};

export type ProblemResponse = {
  status: number;
  contentType: string;
  body: Buffer;
};

export type RenderOptions = {
  fallbackStatus?: number;
};

function isResponseStatus(status: number | undefined): status is number {
  return responseStatusSchema.safeParse(status).success;
}

function matchSpecificity(mediaRange: string, mediaTypes: readonly string[]): number {
  if (mediaRange === '*/*') {
    return FULL_WILDCARD_MATCH;
  }

  if (mediaRange.endsWith('/*')) {
    const type = mediaRange.slice(0, -1);
    return mediaTypes.some((mediaType) => mediaType.startsWith(type)) ? TYPE_WILDCARD_MATCH : 0;
  }

  return mediaTypes.includes(mediaRange) ? EXACT_MATCH : 0;
}

/**
 * Quality of the most specific preference matching the codec; equally
 * specific matches resolve to the highest quality.
 */
function weigh(codec: ProblemCodec, preferences: readonly MediaRangePreference[]): number {
  let specificity = 0;
  let quality = 0;
  for (const preference of preferences) {
    const candidate = matchSpecificity(preference.mediaRange, codec.mediaTypes);
    if (candidate > specificity) {
      specificity = candidate;
      quality = preference.quality;
    } else if (candidate > 0 && candidate === specificity) {
      quality = Math.max(quality, preference.quality);
    }
  }

  return quality;
}

export class ContentNegotiator {
  readonly fallbackStatus: number;

  private readonly codecs: readonly ProblemCodec[];
  private readonly logger: AppLogger;

  constructor(codecs: Iterable<ProblemCodec>, options: NegotiatorOptions = {}) {
    const available = [...codecs].sort(
      (left, right) => FORMAT_PRIORITY[left.format] - FORMAT_PRIORITY[right.format],
    );

    if (available.length === 0) {
      throw createNoCodecAvailable();
    }

    this.codecs = available;
    this.logger = options.logger ?? silentLogger;
    this.fallbackStatus = assertResponseStatus(options.fallbackStatus ?? DEFAULT_FALLBACK_STATUS);
  }

  get formats(): ProblemFormat[] {
    return this.codecs.map((codec) => codec.format);
  }

  get defaultCodec(): ProblemCodec {
    return this.codecs[0];
  }

  codecFor(format: ProblemFormat): ProblemCodec | undefined {
    return this.codecs.find((codec) => codec.format === format);
  }

  negotiate(signal: PreferenceSignal): Negotiation {
    const preferences = toPreferences(signal);

    let selected: Negotiation | null = null;
    for (const codec of this.codecs) {
      const quality = weigh(codec, preferences);
      if (quality > 0 && (!selected || quality > selected.quality)) {
        selected = { codec, quality, matched: true };
      }
    }

    if (selected) {
      return selected;
    }

    this.logger.debug(
      { accept: preferences, format: this.defaultCodec.format },
      'No acceptable problem format requested; using default',
    );

    return { codec: this.defaultCodec, quality: 0, matched: false };
  }

  render(problem: ProblemDetails, signal: PreferenceSignal, options: RenderOptions = {}): ProblemResponse {
    const { codec } = this.negotiate(signal);
    const fallbackStatus =
      options.fallbackStatus === undefined ? this.fallbackStatus : assertResponseStatus(options.fallbackStatus);

    return {
      status: isResponseStatus(problem.status) ? problem.status : fallbackStatus,
      contentType: codec.contentType,
      body: codec.encode(problem),
    };
  }
}

/** Shared rendering step behind every response adapter. */
export function renderProblem(
  negotiator: ContentNegotiator,
  problem: ProblemDetails,
  signal: PreferenceSignal,
  options: RenderOptions = {},
): ProblemResponse {
  return negotiator.render(problem, signal, options);
}

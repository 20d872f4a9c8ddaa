export type MediaRangePreference = {
  mediaRange: string;
  quality: number;
};

/** An `Accept` header value, or preferences already parsed from one. */
export type PreferenceSignal =
  | string
  | readonly string[]
  | readonly MediaRangePreference[]
  | null
  | undefined;

const TOKEN = "[!#$%&'*+.^_`|~0-9A-Za-z-]+";
const MEDIA_RANGE_PATTERN = new RegExp(`^(?:\\*/\\*|${TOKEN}/\\*|${TOKEN}/${TOKEN})$`);
const QUALITY_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)$/;

function clampQuality(quality: number): number {
  return Math.min(Math.max(quality, 0), 1);
}

function parseMediaRange(part: string): MediaRangePreference | null {
  const [range = '', ...parameters] = part.split(';').map((segment) => segment.trim());
  const mediaRange = range.toLowerCase();
  if (!MEDIA_RANGE_PATTERN.test(mediaRange)) {
    return null;
  }

  let quality = 1;
  for (const parameter of parameters) {
    const separator = parameter.indexOf('=');
    const name = parameter.slice(0, separator).trim().toLowerCase();
    if (separator === -1 || name !== 'q') {
      continue;
    }

    const value = parameter.slice(separator + 1).trim();
    if (!QUALITY_PATTERN.test(value)) {
      return null;
    }

    quality = clampQuality(Number(value));
    break;
  }

  return { mediaRange, quality };
}

/**
 * Parses an HTTP `Accept` header into ordered media range preferences.
 * Malformed ranges are dropped.
 */
export function parseAcceptHeader(header: string | readonly string[] | null | undefined) {
  if (!header) {
    return [];
  }

  const raw = typeof header === 'string' ? header : header.join(',');
  const preferences: MediaRangePreference[] = [];
  for (const part of raw.split(',')) {
    const preference = parseMediaRange(part);
    if (preference) {
      preferences.push(preference);
    }
  }

  return preferences;
}

export function toPreferences(signal: PreferenceSignal): MediaRangePreference[] {
  if (!signal) {
    return [];
  }

  if (typeof signal === 'string') {
    return parseAcceptHeader(signal);
  }

  const preferences: MediaRangePreference[] = [];
  for (const entry of signal) {
    if (typeof entry === 'string') {
      preferences.push(...parseAcceptHeader(entry));
    } else {
      preferences.push({
        mediaRange: entry.mediaRange.trim().toLowerCase(),
        quality: Number.isFinite(entry.quality) ? clampQuality(entry.quality) : 0,
      });
    }
  }

  return preferences;
}

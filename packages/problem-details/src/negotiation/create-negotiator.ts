import type { ProblemCodec } from '../codecs/codec';
import { JsonProblemCodec } from '../codecs/json-codec';
import { XmlProblemCodec } from '../codecs/xml-codec';
import type { AppConfig } from '../config';
import type { AppLogger } from '../lib/logger';
import { ContentNegotiator, type NegotiatorOptions } from './negotiator';

export type FormatSelection = AppConfig['formats'];

export const DEFAULT_FORMATS: FormatSelection = {
  json: true,
  xml: false,
};

export function createCodecs(formats: FormatSelection, logger?: AppLogger): ProblemCodec[] {
  const codecs: ProblemCodec[] = [];
  if (formats.json) {
    codecs.push(new JsonProblemCodec({ logger }));
  }

  if (formats.xml) {
    codecs.push(new XmlProblemCodec({ logger }));
  }

  return codecs;
}

export function createNegotiator(
  formats: FormatSelection = DEFAULT_FORMATS,
  options: NegotiatorOptions = {},
): ContentNegotiator {
  return new ContentNegotiator(createCodecs(formats, options.logger), options);
}

export function createNegotiatorFromConfig(config: AppConfig, logger?: AppLogger): ContentNegotiator {
  return createNegotiator(config.formats, {
    logger,
    fallbackStatus: config.http.fallbackStatus,
  });
}

import { silentLogger, type AppLogger } from '../lib/logger';
import { ProblemDetailsError } from '../problem/errors';
import type { ProblemDetails } from '../problem/problem-details';

export type ProblemFormat = 'json' | 'xml';

export type DecodeResult =
  | { success: true; problem: ProblemDetails }
  | { success: false; error: ProblemDetailsError };

export type CodecOptions = {
  logger?: AppLogger;
};

export interface ProblemCodec {
  readonly format: ProblemFormat;
  /** Media type written to the `Content-Type` header. */
  readonly contentType: string;
  /** Every media type this codec answers for during negotiation. */
  readonly mediaTypes: readonly string[];
  encode(problem: ProblemDetails): Buffer;
  decode(body: Buffer | string): ProblemDetails;
  safeDecode(body: Buffer | string): DecodeResult;
}

export abstract class BaseProblemCodec implements ProblemCodec {
  abstract readonly format: ProblemFormat;
  abstract readonly contentType: string;
  abstract readonly mediaTypes: readonly string[];

  protected readonly logger: AppLogger;

  constructor(options: CodecOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  abstract serialize(problem: ProblemDetails): string;

  abstract parse(text: string): ProblemDetails;

  encode(problem: ProblemDetails): Buffer {
    return Buffer.from(this.serialize(problem), 'utf8');
  }

  decode(body: Buffer | string): ProblemDetails {
    return this.parse(typeof body === 'string' ? body : body.toString('utf8'));
  }

  safeDecode(body: Buffer | string): DecodeResult {
    try {
      return { success: true, problem: this.decode(body) };
    } catch (error) {
      if (error instanceof ProblemDetailsError) {
        this.logger.debug({ kind: error.kind, format: this.format }, 'Problem document rejected');
        return { success: false, error };
      }

      throw error;
    }
  }
}

import { HttpStatus } from '@nestjs/common';

export type GenerationErrorKind =
  | 'InvalidRequest'
  | 'UpstreamUnavailable'
  | 'UnparseableUpstreamPayload'
  | 'NoHashtagsProducible';

const STATUS_BY_KIND: Record<GenerationErrorKind, number> = {
  InvalidRequest: HttpStatus.BAD_REQUEST,
  NoHashtagsProducible: HttpStatus.UNPROCESSABLE_ENTITY,
  UnparseableUpstreamPayload: HttpStatus.BAD_GATEWAY,
  UpstreamUnavailable: HttpStatus.SERVICE_UNAVAILABLE,
};

export class GenerationError extends Error {
  readonly kind: GenerationErrorKind;

  constructor(kind: GenerationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
    this.kind = kind;
  }

  get status(): number {
    return STATUS_BY_KIND[this.kind];
  }
}

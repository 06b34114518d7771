import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import type { Request, Response } from 'express';
import { ZodError } from 'zod';
import { GenerationError } from '../errors/generation-error';

export type ApiError = {
  code: number;
  message: string;
  reason?: string;
};

export type ErrorEnvelope = {
  meta: {
    status: number;
    errors: ApiError[];
    requestId?: string;
  };
};

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function extractHttpMessage(exception: HttpException): { message: string; reason?: string } {
  const res = exception.getResponse();
  if (typeof res === 'string') return { message: res };
  if (isObject(res)) {
    const message = res.message;
    const error = res.error;
    if (Array.isArray(message)) {
      return { message: message.join('\n'), reason: typeof error === 'string' ? error : undefined };
    }
    if (typeof message === 'string') {
      return { message, reason: typeof error === 'string' ? error : undefined };
    }
  }
  return { message: exception.message };
}

function requestIdOf(req: (Request & { requestId?: string }) | undefined): string | null {
  const fromMiddleware = (req?.requestId ?? '').trim();
  if (fromMiddleware) return fromMiddleware;
  const header = req?.headers?.['x-request-id'];
  return typeof header === 'string' && header.trim() ? header.trim() : null;
}

/** Maps any thrown value to `{ status, body }`; exported for unit tests. */
export function toErrorEnvelope(exception: unknown, requestId: string | null): { status: number; body: ErrorEnvelope } {
  let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
  let errors: ApiError[];

  if (exception instanceof ZodError) {
    // Zod validation errors
    status = HttpStatus.BAD_REQUEST;
    errors = exception.issues.map((i) => ({
      code: HttpStatus.BAD_REQUEST,
      message: i.message,
      reason: i.path.length ? i.path.join('.') : 'validation',
    }));
    if (!errors.length) errors = [{ code: HttpStatus.BAD_REQUEST, message: 'Invalid request', reason: 'validation' }];
  } else if (exception instanceof GenerationError) {
    status = exception.status;
    errors = [{ code: status, message: exception.message, reason: exception.kind }];
  } else if (exception instanceof HttpException) {
    // Nest HTTP exceptions
    status = exception.getStatus();
    const { message, reason } = extractHttpMessage(exception);
    errors = [{ code: status, message, reason }];
  } else {
    errors = [{ code: status, message: 'Internal server error', reason: 'internal_error' }];
  }

  return {
    status,
    body: { meta: { status, errors, ...(requestId ? { requestId } : {}) } },
  };
}

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger('API');

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();
    const req = ctx.getRequest<Request & { requestId?: string }>();
    const requestId = requestIdOf(req);

    const { status, body } = toErrorEnvelope(exception, requestId);
    if (status >= HttpStatus.INTERNAL_SERVER_ERROR && !(exception instanceof GenerationError)) {
      // Still return a safe envelope, but keep the underlying error for debugging.
      this.logger.error(
        `Unhandled exception rid=${requestId ?? '-'}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    }
    return res.status(status).json(body);
  }
}

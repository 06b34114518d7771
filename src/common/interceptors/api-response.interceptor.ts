import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Handlers that already return `{ data, ... }` pass through; anything else becomes `{ data: body }`. */
export function toDataEnvelope(body: unknown): Record<string, unknown> {
  if (isObject(body) && 'data' in body) return body;
  return { data: body };
}

@Injectable()
export class ApiResponseInterceptor implements NestInterceptor {
  intercept(_context: ExecutionContext, next: CallHandler): Observable<unknown> {
    return next.handle().pipe(map(toDataEnvelope));
  }
}

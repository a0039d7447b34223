import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';

import { ApiResponse } from '../utils/response.util';

/**
 * Wraps every successful API response as `{ success: true, data, timestamp }`.
 */
@Injectable()
export class TransformInterceptor<T> implements NestInterceptor<T, ApiResponse<T> | T> {
  intercept(context: ExecutionContext, next: CallHandler<T>): Observable<ApiResponse<T> | T> {
    const request = context.switchToHttp().getRequest<{ url: string }>();

    // Only API routes are wrapped; /metrics stays plain text
    if (!request.url.startsWith('/api')) {
      return next.handle();
    }

    return next.handle().pipe(
      map((data: T) => ({
        success: true,
        data,
        timestamp: new Date().toISOString(),
      })),
    );
  }
}

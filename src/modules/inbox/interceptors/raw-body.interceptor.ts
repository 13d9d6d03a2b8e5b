import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import type { InboxRequest } from '../request.types';

/**
 * Raw Body Interceptor
 *
 * Hands the exact received bytes to the handler as the body. The
 * application installs a raw body parser for every content type; a parsed
 * object is never re-serialized, because the signature covers the bytes.
 */
@Injectable()
export class RawBodyInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<InboxRequest>();

    if (Buffer.isBuffer(request.rawBody)) {
      request.body = request.rawBody;
    } else if (Buffer.isBuffer(request.body)) {
      request.rawBody = request.body;
    } else if (typeof request.body === 'string') {
      request.rawBody = Buffer.from(request.body, 'utf8');
      request.body = request.rawBody;
    } else {
      // Nothing arrived as bytes (no body, or no raw parser)
      request.rawBody = Buffer.alloc(0);
      request.body = request.rawBody;
    }

    return next.handle();
  }
}

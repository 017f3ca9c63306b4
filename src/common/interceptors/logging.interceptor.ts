import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
  Logger,
} from '@nestjs/common';
import { Observable, tap } from 'rxjs';
import type { Request, Response } from 'express';
import { SaleEngineError } from '../../engine/sale-engine.error.js';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const { method, url } = request;
    const startTime = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          const duration = Date.now() - startTime;
          const response = context.switchToHttp().getResponse<Response>();
          this.logger.log(`${method} ${url} ${response.statusCode} - ${duration}ms`);
        },
        error: (error: unknown) => {
          const duration = Date.now() - startTime;
          const status = error instanceof HttpException ? error.getStatus() : 500;
          const code = error instanceof SaleEngineError ? ` ${error.code}` : '';
          this.logger.warn(`${method} ${url} ${status}${code} - ${duration}ms`);
        },
      }),
    );
  }
}

import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Request } from 'express';

export type AppLogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly AppLogLevel[] = ['debug', 'info', 'warn', 'error'];

export const isAppLogLevel = (value: string): value is AppLogLevel =>
  LEVELS.some((level) => level === value);

export class Logger {
  private static logLevel: AppLogLevel = 'debug';

  static setLevel(level: AppLogLevel) {
    this.logLevel = level;
  }

  static enabled(level: AppLogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  static log(message: string, context?: string) {
    if (this.enabled('info')) {
      console.log(`[LOG] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    }
  }

  static error(message: string, trace: string, context?: string) {
    console.error(`[ERROR] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    if (trace) {
      console.error(trace);
    }
  }

  static warn(message: string, context?: string) {
    if (this.enabled('warn')) {
      console.warn(`[WARN] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    }
  }

  static debug(message: string, context?: string) {
    if (this.enabled('debug')) {
      console.debug(`[DEBUG] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    }
  }
}

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const { method, url, query, params } = request;

    // Bodies are uploads here; log their shape, not their content
    Logger.debug(
      `Request: ${method} ${url} \nQuery: ${JSON.stringify(query)} \nParams: ${JSON.stringify(params)}`,
      'LoggingInterceptor',
    );

    const now = Date.now();
    return next.handle().pipe(
      tap(() => {
        Logger.debug(`Response: ${method} ${url} ${Date.now() - now}ms`, 'LoggingInterceptor');
      }),
    );
  }
}

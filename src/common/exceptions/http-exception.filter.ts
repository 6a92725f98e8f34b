import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Logger } from '../interceptors/logging.interceptor';

type ErrorMessage = string | string[];

export interface ErrorBody {
  statusCode: number;
  timestamp: string;
  path: string;
  error: string;
  message: ErrorMessage;
  [extra: string]: unknown;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const readMessage = (body: Record<string, unknown>, fallback: string): ErrorMessage => {
  const { message } = body;
  if (typeof message === 'string') return message;
  if (Array.isArray(message)) return message.map(String);
  return fallback;
};

export function toErrorBody(exception: unknown, path: string): ErrorBody {
  let status = HttpStatus.INTERNAL_SERVER_ERROR;
  let message: ErrorMessage = 'Internal server error';
  let error = 'Internal Server Error';
  let details: Record<string, unknown> = {};

  if (exception instanceof HttpException) {
    status = exception.getStatus();
    const exceptionResponse = exception.getResponse();
    if (isRecord(exceptionResponse)) {
      // Keep extra payload such as per-row validation errors
      const { message: _message, statusCode: _statusCode, error: _error, ...rest } = exceptionResponse;
      message = readMessage(exceptionResponse, exception.message);
      details = rest;
    } else if (typeof exceptionResponse === 'string') {
      message = exceptionResponse;
    }
    error = exception.name;
  }

  return {
    ...details,
    statusCode: status,
    timestamp: new Date().toISOString(),
    path,
    error,
    message,
  };
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body = toErrorBody(exception, request.url);
    const summary = Array.isArray(body.message) ? body.message.join('; ') : body.message;
    const line = `${request.method} ${request.url} ${body.statusCode} - ${summary}`;

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const trace = exception instanceof Error ? exception.stack || 'No stack trace available' : '';
      Logger.error(line, trace, 'HttpExceptionFilter');
    } else {
      Logger.warn(line, 'HttpExceptionFilter');
    }

    response.status(body.statusCode).json(body);
  }
}

import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';

// Turns every thrown error into the HttpExceptionResponse shape.
// Non-HTTP errors become 500 and are logged with their stack.
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body = this.toBody(exception, request.url);
    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const stack = exception instanceof Error ? exception.stack : undefined;
      this.logger.error(`${request.method} ${request.url} failed`, stack);
    }

    response.status(body.statusCode).json(body);
  }

  private toBody(exception: unknown, path: string): HttpExceptionResponse {
    const timestamp = new Date().toISOString();

    if (!(exception instanceof HttpException)) {
      return {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        message: 'Internal server error',
        error: 'Internal Server Error',
        timestamp,
        path,
      };
    }

    const statusCode = exception.getStatus();
    const payload = exception.getResponse();

    if (typeof payload === 'string') {
      return { statusCode, message: payload, error: exception.name, timestamp, path };
    }

    // Built-in exceptions respond with { statusCode, message, error }
    const message = readMessage(payload) ?? exception.message;
    const error = readString(payload, 'error') ?? exception.name;
    return { statusCode, message, error, timestamp, path };
  }
}

function readMessage(payload: object): string | string[] | undefined {
  if (!('message' in payload)) {
    return undefined;
  }
  const { message } = payload;
  if (typeof message === 'string') {
    return message;
  }
  if (Array.isArray(message) && message.every((m): m is string => typeof m === 'string')) {
    return message;
  }
  return undefined;
}

function readString(payload: object, key: string): string | undefined {
  const value: unknown = Reflect.get(payload, key);
  return typeof value === 'string' ? value : undefined;
}

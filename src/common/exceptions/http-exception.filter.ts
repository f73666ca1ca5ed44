import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Logger } from '../interceptors/logging.interceptor';

export interface ErrorResponseBody {
  statusCode: number;
  timestamp: string;
  path: string;
  error: string;
  message: string | string[];
}

function responseMessage(exceptionResponse: string | object, fallback: string): string | string[] {
  if (typeof exceptionResponse === 'string') return exceptionResponse;
  if ('message' in exceptionResponse) {
    const { message } = exceptionResponse;
    if (typeof message === 'string') return message;
    if (Array.isArray(message) && message.every((m): m is string => typeof m === 'string')) return message;
  }
  return fallback;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let message: string | string[] = 'Internal server error';
    let error = 'Internal Server Error';

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      message = responseMessage(exception.getResponse(), exception.message);
      error = exception.name;
    } else if (exception instanceof Error) {
      message = exception.message;
      error = exception.name;
    }

    Logger.error(
      `${request.method} ${request.url} ${status} - ${Array.isArray(message) ? message.join('; ') : message}`,
      exception instanceof Error ? exception.stack || 'No stack trace available' : '',
      'HttpExceptionFilter',
    );

    const body: ErrorResponseBody = {
      statusCode: status,
      timestamp: new Date().toISOString(),
      path: request.url,
      error,
      message,
    };
    response.status(status).json(body);
  }
}

import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { GymRuleError } from '../../domain/gym/errors';
import { logger } from '../logger/logger.config';

/**
 * Rule violations that escape a handler become 422 responses carrying the
 * rule's code, so callers can tell them apart from malformed requests.
 */
@Catch(GymRuleError)
export class GymRuleExceptionFilter implements ExceptionFilter {
  private readonly logger = logger();

  catch(exception: GymRuleError, host: ArgumentsHost) {
    const http = host.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();
    const statusCode = HttpStatus.UNPROCESSABLE_ENTITY;

    this.logger.warn(
      { path: request.url, code: exception.code, error: exception.message },
      'Gym rule violation',
    );

    response.status(statusCode).json({
      statusCode,
      error: exception.code,
      message: exception.message,
    });
  }
}

import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import {
  GameshowError,
  GameshowErrorKind,
} from '../errors/gameshow.error';

const STATUS_BY_KIND: Record<GameshowErrorKind, HttpStatus> = {
  InvalidInput: HttpStatus.BAD_REQUEST,
  NotFound: HttpStatus.NOT_FOUND,
  PhaseMismatch: HttpStatus.NOT_ACCEPTABLE,
  NoJokersLeft: HttpStatus.NOT_ACCEPTABLE,
  LoadFailure: HttpStatus.BAD_REQUEST,
};

@Catch(GameshowError)
export class GameshowExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GameshowExceptionFilter.name);

  catch(exception: GameshowError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const statusCode = STATUS_BY_KIND[exception.kind];

    this.logger.warn(`Rejected (${exception.kind}): ${exception.message}`);

    response.status(statusCode).json({
      statusCode,
      error: exception.kind,
      message: exception.message,
    });
  }
}

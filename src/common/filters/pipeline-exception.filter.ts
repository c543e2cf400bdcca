import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { PipelineError, PipelineErrorKind } from '../errors/pipeline.errors';

const STATUS_BY_KIND: Record<PipelineErrorKind, HttpStatus> = {
  structural: HttpStatus.UNPROCESSABLE_ENTITY,
  validation: HttpStatus.BAD_REQUEST,
  transient: HttpStatus.BAD_GATEWAY,
};

@Catch(PipelineError)
export class PipelineExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(PipelineExceptionFilter.name);

  catch(exception: PipelineError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const status = STATUS_BY_KIND[exception.kind];

    this.logger.warn(`${exception.name}: ${exception.message}`);
    response.status(status).json({
      statusCode: status,
      error: exception.name,
      kind: exception.kind,
      message: exception.message,
    });
  }
}

import {
  BadRequestException,
  ForbiddenException,
  HttpException,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';

import {
  ConfigurationError,
  EncodeError,
  ForbiddenOperationError,
  TransportError,
  UnknownMessageError,
  UnknownNodeError,
} from '../errors/engine-errors';

/** Maps engine failures raised by a command to the HTTP response a client should see. */
export function toHttpException(error: unknown): unknown {
  if (error instanceof HttpException) {
    return error;
  }
  if (error instanceof UnknownNodeError || error instanceof UnknownMessageError) {
    return new NotFoundException(error.message);
  }
  if (error instanceof ForbiddenOperationError) {
    return new ForbiddenException(error.message);
  }
  if (error instanceof TransportError || error instanceof ConfigurationError) {
    return new ServiceUnavailableException(error.message);
  }
  if (error instanceof EncodeError) {
    return new BadRequestException(error.message);
  }
  return error;
}

export async function runCommand<T>(command: () => Promise<T> | T): Promise<T> {
  try {
    return await command();
  } catch (error) {
    throw toHttpException(error);
  }
}

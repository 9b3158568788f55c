import { z } from 'zod';

// Error response utility
export interface ErrorResponse {
  success: false;
  message: string;
  error_code: string;
  details?: unknown;
  timestamp: string;
}

export function createErrorResponse(
  message: string,
  errorCode: string,
  details?: unknown
): ErrorResponse {
  const response: ErrorResponse = {
    success: false,
    message,
    error_code: errorCode,
    timestamp: new Date().toISOString()
  };

  if (details !== undefined) {
    response.details = details;
  }

  return response;
}

export class DatabaseUnavailableError extends Error {
  constructor() {
    super('Database not available');
    this.name = 'DatabaseUnavailableError';
  }
}

export class InvalidCollectionError extends Error {
  constructor(public readonly collection: string) {
    super(`Invalid collection name: ${collection}`);
    this.name = 'InvalidCollectionError';
  }
}

export const MAX_ERROR_MESSAGE_LENGTH = 200;

export function errorMessage(error: unknown, maxLength = MAX_ERROR_MESSAGE_LENGTH): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.slice(0, maxLength);
}

export interface HttpError {
  status: number;
  body: ErrorResponse;
}

/*
  Maps a failure raised while handling a request onto status code and body.
  Validation problems are the caller's fault; other failures get `storageStatus`.
*/
export function toHttpError(error: unknown, storageStatus = 500): HttpError {
  if (error instanceof z.ZodError) {
    return {
      status: 400,
      body: createErrorResponse('Invalid input data', 'VALIDATION_ERROR', error.errors),
    };
  }

  if (error instanceof DatabaseUnavailableError) {
    return {
      status: 500,
      body: createErrorResponse(error.message, 'DATABASE_UNAVAILABLE'),
    };
  }

  return {
    status: storageStatus,
    body: createErrorResponse(errorMessage(error), 'DATABASE_ERROR'),
  };
}

import { ZodError } from 'zod';
import {
  AlignmentError,
  UploadError,
  WarehouseConnectionError,
  WarehouseQueryError
} from '@gridcarbon/emissions';

export interface ErrorResponse {
  statusCode: number;
  message: string;
  details?: unknown;
}

export const mapErrorToResponse = (error: unknown): ErrorResponse => {
  if (error instanceof AlignmentError) {
    return {
      statusCode: 422,
      message: error.message,
      details: { code: error.code, column: error.column }
    };
  }

  if (error instanceof WarehouseConnectionError) {
    return {
      statusCode: 503,
      message: 'Warehouse is unavailable',
      details: { code: error.code }
    };
  }

  if (error instanceof WarehouseQueryError) {
    return {
      statusCode: 502,
      message: error.message,
      details: { code: error.code }
    };
  }

  if (error instanceof UploadError) {
    return {
      statusCode: 502,
      message: error.message,
      details: { code: error.code, step: error.step, phase: error.phase, targetTable: error.targetTable }
    };
  }

  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      message: 'Request validation failed',
      details: error.flatten()
    };
  }

  return {
    statusCode: 500,
    message: 'Unexpected error'
  };
};

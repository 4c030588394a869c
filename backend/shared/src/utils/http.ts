import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { getCurrentTimestamp } from './dynamodb-client';
import { AccessDeniedError, AppError, InsufficientStockError } from './errors';
import { logger } from './logger';
import { parseJsonObject } from './validators';

/**
 * API Gateway response helpers shared by every HTTP handler
 */

const CORS_HEADERS = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,X-User-Id',
  'Access-Control-Allow-Methods': 'OPTIONS,POST,GET',
};

/**
 * Helper: Success response
 */
export function successResponse(statusCode: number, data: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(data),
  };
}

/**
 * Helper: Error response
 */
export function errorResponse(
  statusCode: number,
  message: string,
  code: string = 'ERROR',
  details: Record<string, unknown> = {}
): APIGatewayProxyResult {
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify({
      error: message,
      code,
      ...details,
      timestamp: getCurrentTimestamp(),
    }),
  };
}

/**
 * Map any thrown value onto an HTTP response. Application errors keep their
 * status and code; anything else is a 500 with no internals exposed.
 */
export function toErrorResponse(error: unknown): APIGatewayProxyResult {
  if (error instanceof InsufficientStockError) {
    return errorResponse(error.statusCode, error.message, error.code, {
      productId: error.productId,
      requested: error.requested,
      available: error.available,
    });
  }
  if (error instanceof AppError) {
    return errorResponse(error.statusCode, error.message, error.code);
  }

  logger.error('Unhandled error', error);
  return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
}

export function parseBody(event: APIGatewayProxyEvent): Record<string, unknown> {
  return parseJsonObject(event.body, 'body');
}

/**
 * Caller identity, set by the API gateway authorizer or the X-User-Id header
 */
export function requireUserId(event: APIGatewayProxyEvent): string {
  const fromAuthorizer = event.requestContext.authorizer?.principalId;
  if (typeof fromAuthorizer === 'string' && fromAuthorizer.length > 0) {
    return fromAuthorizer;
  }

  const header = Object.entries(event.headers ?? {}).find(([name]) => name.toLowerCase() === 'x-user-id');
  const userId = header?.[1];
  if (!userId) {
    throw new AccessDeniedError('Missing caller identity');
  }
  return userId;
}

/**
 * Input Validation Utilities
 * Narrow untyped input (request bodies, queue messages, stored items) into
 * domain values before anything is written.
 */
import { ValidationError } from './errors';
import { ShippingInfo } from '../types';

export { ValidationError };

/**
 * Validate email format
 */
export function validateEmail(email: string): boolean {
  const emailRegex = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
  return emailRegex.test(email);
}

/**
 * Validate positive integer (quantities, amounts in cents)
 */
export function validatePositiveInteger(value: unknown, fieldName: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${fieldName} must be a positive integer`, fieldName, value);
  }
  return value;
}

/**
 * Validate string length
 */
export function validateStringLength(
  value: unknown,
  fieldName: string,
  min?: number,
  max?: number
): string {
  if (typeof value !== 'string') {
    throw new ValidationError(`${fieldName} must be a string`, fieldName, value);
  }

  if (min !== undefined && value.length < min) {
    throw new ValidationError(`${fieldName} must be at least ${min} characters`, fieldName, value);
  }

  if (max !== undefined && value.length > max) {
    throw new ValidationError(`${fieldName} must be at most ${max} characters`, fieldName, value);
  }

  return value;
}

/**
 * Validate enum value
 */
export function validateEnum<V extends string>(
  value: unknown,
  enumType: Record<string, V>,
  fieldName: string
): V {
  const validValues = Object.values(enumType);
  for (const candidate of validValues) {
    if (candidate === value) {
      return candidate;
    }
  }

  throw new ValidationError(
    `${fieldName} must be one of: ${validValues.join(', ')}`,
    fieldName,
    value
  );
}

/**
 * Narrow an unknown value to a plain object
 */
export function asRecord(value: unknown, fieldName: string): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ValidationError(`${fieldName} must be an object`, fieldName, value);
  }

  const record: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    record[key] = entry;
  }
  return record;
}

/**
 * Parse a JSON request or message body into a plain object
 */
export function parseJsonObject(body: string | null | undefined, fieldName = 'body'): Record<string, unknown> {
  if (!body) {
    throw new ValidationError(`${fieldName} is required`, fieldName);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new ValidationError(`${fieldName} is not valid JSON`, fieldName);
  }

  return asRecord(parsed, fieldName);
}

export function readString(source: Record<string, unknown>, field: string): string {
  const value = source[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`${field} must be a non-empty string`, field, value);
  }
  return value;
}

export function readOptionalString(source: Record<string, unknown>, field: string): string | undefined {
  const value = source[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`, field, value);
  }
  return value;
}

export function readNumber(source: Record<string, unknown>, field: string): number {
  const value = source[field];
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ValidationError(`${field} must be a number`, field, value);
  }
  return value;
}

export function readOptionalNumber(source: Record<string, unknown>, field: string): number | undefined {
  return source[field] === undefined ? undefined : readNumber(source, field);
}

export function readBoolean(source: Record<string, unknown>, field: string): boolean {
  const value = source[field];
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${field} must be a boolean`, field, value);
  }
  return value;
}

export function readEnum<V extends string>(
  source: Record<string, unknown>,
  field: string,
  enumType: Record<string, V>
): V {
  return validateEnum(source[field], enumType, field);
}

export function readOptionalEnum<V extends string>(
  source: Record<string, unknown>,
  field: string,
  enumType: Record<string, V>
): V | undefined {
  return source[field] === undefined ? undefined : validateEnum(source[field], enumType, field);
}

/**
 * Validate recipient and address of an order
 */
export function validateShippingInfo(source: Record<string, unknown>): ShippingInfo {
  const recipientName = sanitizeString(validateStringLength(source.recipientName, 'recipientName', 1, 100));
  const recipientEmail = validateStringLength(source.recipientEmail, 'recipientEmail', 3, 254);
  const deliveryAddress = sanitizeString(validateStringLength(source.deliveryAddress, 'deliveryAddress', 5, 300));

  if (!validateEmail(recipientEmail)) {
    throw new ValidationError('recipientEmail must be a valid email address', 'recipientEmail', recipientEmail);
  }

  return { recipientName, recipientEmail, deliveryAddress };
}

/**
 * Sanitize string input
 */
export function sanitizeString(input: string): string {
  return input
    .replace(/[\x00-\x1F\x7F]/g, '') // Remove control characters
    .trim()
    .replace(/\s+/g, ' '); // Normalize whitespace
}

/**
 * Usage Examples:
 *
 * // Parse a request body
 * const body = parseJsonObject(event.body);
 * const quantity = validatePositiveInteger(body.quantity, 'quantity');
 *
 * // Validate enum
 * const status = readEnum(body, 'status', ShipmentStatus);
 *
 * // Validate shipping fields
 * const shippingInfo = validateShippingInfo(asRecord(body.shippingInfo, 'shippingInfo'));
 */

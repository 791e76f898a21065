/**
 * JSONB Size Validation
 */

import { ValidationError } from '@errors';

/** Maximum JSONB document size in bytes (1MB) */
export const MAX_JSONB_SIZE = 1024 * 1024;

/**
 * Serialize data for JSONB storage, rejecting oversized documents
 * @throws ValidationError if the serialized data exceeds maxSize bytes
 */
export function serializeForJSONB(data: unknown, maxSize: number = MAX_JSONB_SIZE): string {
  const jsonString = JSON.stringify(data);
  const sizeInBytes = Buffer.byteLength(jsonString, 'utf8');

  if (sizeInBytes > maxSize) {
    throw new ValidationError(
      `JSONB data exceeds maximum size of ${maxSize} bytes (got ${sizeInBytes} bytes)`
    );
  }

  return jsonString;
}

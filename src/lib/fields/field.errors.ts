/**
 * Field Errors
 */

import { FIELD_TYPES } from './field.types';

/**
 * Raised when a caller asks for a field type the inferencer does not know
 */
export class UnsupportedFieldTypeError extends Error {
  constructor(public readonly fieldType: string) {
    super(`Unsupported field type: ${fieldType}. Expected one of ${FIELD_TYPES.join(', ')}`);
    this.name = 'UnsupportedFieldTypeError';
  }
}

/**
 * Request body schema used by the validateBody middleware.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required: boolean;
  maxLength?: number;
  /** Strings only: reject values that are empty after trimming. */
  nonEmpty?: boolean;
  min?: number;
  max?: number;
  enum?: readonly string[];
}

export type BodySchema = Record<string, FieldSchema>;

/**
 * Shared utility types.
 */

export type FieldType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  /** Strings: maximum length. Arrays: maximum number of items. */
  maxLength?: number;
  min?: number;
  max?: number;
  enum?: string[];
  /** Accept an explicit null for an optional field. */
  nullable?: boolean;
}

export type BodySchema = Record<string, FieldSchema>;

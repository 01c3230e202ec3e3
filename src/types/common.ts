/**
 * Shared schema types used by request validation and tool argument validation.
 */

export type FieldType =
  | 'string'
  | 'integer'
  | 'number'
  | 'boolean'
  | 'array'
  | 'object';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  /** Shown to the language model when the schema describes a tool parameter. */
  description?: string;
  maxLength?: number;
  min?: number;
  max?: number;
  enum?: string[];
}

export type BodySchema = Record<string, FieldSchema>;

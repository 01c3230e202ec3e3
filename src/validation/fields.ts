/**
 * Field-level validation against a BodySchema.
 * Used for HTTP request bodies and for tool arguments coming from the model.
 */

import type { BodySchema, FieldSchema } from '../types/common.js';

export function validateFields(
  body: Record<string, unknown>,
  schema: BodySchema
): string[] {
  const errors: string[] = [];

  for (const [field, fieldSchema] of Object.entries(schema)) {
    const value = body[field];

    if (fieldSchema.required && (value === undefined || value === null)) {
      errors.push(`${field} is required`);
      continue;
    }

    if (value === undefined || value === null) {
      continue;
    }

    const typeError = checkType(field, value, fieldSchema);
    if (typeError) {
      errors.push(typeError);
      continue;
    }

    errors.push(...checkConstraints(field, value, fieldSchema));
  }

  return errors;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkType(
  field: string,
  value: unknown,
  schema: FieldSchema
): string | null {
  switch (schema.type) {
    case 'string':
      if (typeof value !== 'string') return `${field} must be a string`;
      break;
    case 'integer':
      if (typeof value !== 'number' || !Number.isInteger(value))
        return `${field} must be an integer`;
      break;
    case 'number':
      if (typeof value !== 'number') return `${field} must be a number`;
      break;
    case 'boolean':
      if (typeof value !== 'boolean') return `${field} must be a boolean`;
      break;
    case 'array':
      if (!Array.isArray(value)) return `${field} must be an array`;
      break;
    case 'object':
      if (!isRecord(value)) return `${field} must be an object`;
      break;
  }
  return null;
}

function checkConstraints(
  field: string,
  value: unknown,
  schema: FieldSchema
): string[] {
  const errors: string[] = [];

  if (schema.type === 'string' && typeof value === 'string') {
    if (schema.maxLength !== undefined && value.length > schema.maxLength) {
      errors.push(`${field} must be ${schema.maxLength} characters or less`);
    }
    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${field} must be one of: ${schema.enum.join(', ')}`);
    }
  }

  if (
    (schema.type === 'number' || schema.type === 'integer') &&
    typeof value === 'number'
  ) {
    if (schema.min !== undefined && value < schema.min) {
      errors.push(`${field} must be at least ${schema.min}`);
    }
    if (schema.max !== undefined && value > schema.max) {
      errors.push(`${field} must be at most ${schema.max}`);
    }
  }

  return errors;
}

/**
 * Body validation middleware.
 * Parses the JSON body, checks it against a schema and throws a
 * ValidationError listing every failing field. The error handler turns that
 * into a 400.
 */

import { ValidationError } from '../errors.js';
import type { BodySchema, FieldSchema } from '../types/common.js';
import type { Handler, Middleware } from './pipeline.js';

export type JsonBody = Record<string, unknown>;

export function validateBody(schema: BodySchema): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const body = await readJsonObject(req);
      const errors = validateFields(body, schema);

      if (errors.length > 0) {
        throw new ValidationError(errors.join('; '), { fields: errors });
      }

      // Re-create request with the consumed body so the handler can read it again
      const newReq = new Request(req.url, {
        method: req.method,
        headers: req.headers,
        body: JSON.stringify(body),
      });

      return next(newReq, ctx);
    };
  };
}

export async function readJsonObject(req: Request): Promise<JsonBody> {
  let parsed: unknown;
  try {
    parsed = await req.json();
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  const body: JsonBody = { ...parsed };
  return body;
}

// ── Typed readers for handlers (body already validated) ──

export function optionalString(body: JsonBody, field: string): string | undefined {
  const value = body[field];
  return typeof value === 'string' ? value : undefined;
}

export function requiredString(body: JsonBody, field: string): string {
  const value = optionalString(body, field);
  if (value === undefined) throw new ValidationError(`${field} is required`);
  return value;
}

export function optionalNumber(body: JsonBody, field: string): number | undefined {
  const value = body[field];
  return typeof value === 'number' ? value : undefined;
}

// ── Private ──

function validateFields(body: JsonBody, schema: BodySchema): string[] {
  const errors: string[] = [];

  for (const [field, fieldSchema] of Object.entries(schema)) {
    const value = body[field];

    if (value === undefined || value === null) {
      if (fieldSchema.required) errors.push(`${field} is required`);
      continue;
    }

    const typeError = checkType(field, value, fieldSchema);
    if (typeError) {
      errors.push(typeError);
      continue;
    }

    errors.push(...checkConstraints(field, value, fieldSchema));
  }

  const unknown = Object.keys(body).filter((key) => !(key in schema));
  if (unknown.length > 0) {
    errors.push(`unknown fields: ${unknown.join(', ')}`);
  }

  return errors;
}

function checkType(field: string, value: unknown, schema: FieldSchema): string | null {
  switch (schema.type) {
    case 'string':
      return typeof value === 'string' ? null : `${field} must be a string`;
    case 'number':
      return typeof value === 'number' && Number.isFinite(value) ? null : `${field} must be a number`;
    case 'boolean':
      return typeof value === 'boolean' ? null : `${field} must be a boolean`;
    case 'array':
      return Array.isArray(value) ? null : `${field} must be an array`;
    case 'object':
      return typeof value === 'object' && !Array.isArray(value) ? null : `${field} must be an object`;
  }
}

function checkConstraints(field: string, value: unknown, schema: FieldSchema): string[] {
  const errors: string[] = [];

  if (typeof value === 'string') {
    if (schema.nonEmpty && value.trim().length === 0) {
      errors.push(`${field} must not be empty`);
    }
    if (schema.maxLength !== undefined && value.length > schema.maxLength) {
      errors.push(`${field} must be ${schema.maxLength} characters or less`);
    }
    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${field} must be one of: ${schema.enum.join(', ')}`);
    }
  }

  if (typeof value === 'number') {
    if (schema.min !== undefined && value < schema.min) {
      errors.push(`${field} must be at least ${schema.min}`);
    }
    if (schema.max !== undefined && value > schema.max) {
      errors.push(`${field} must be at most ${schema.max}`);
    }
  }

  return errors;
}

import Joi from 'joi';
import { z } from 'zod';
import { ValidationError } from './errors';

// Common validation schemas
export const requiredStringSchema = Joi.string().required().trim().min(1);
export const identifierSchema = Joi.string().trim().min(1).max(64).required();

export { ValidationError };

// Helper function to validate and throw custom error
export function validateAndThrow<T>(schema: Joi.Schema<T>, data: unknown): T {
  const { error, value } = schema.validate(data, { abortEarly: false });
  if (error) {
    throw new ValidationError('Validation failed', {
      fields: error.details.map(detail => ({
        field: detail.path.join('.'),
        message: detail.message
      }))
    });
  }
  return value;
}

// Request payload validation for controllers
export function validateRequest<S extends z.ZodTypeAny>(data: unknown, schema: S): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError('Invalid request', {
      fields: result.error.issues.map(issue => ({
        field: issue.path.join('.'),
        message: issue.message
      }))
    });
  }
  return result.data;
}

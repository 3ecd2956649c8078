import Joi from 'joi';
import { ValidationError } from '../errors';
import { FieldBag } from '../types';

/**
 * Validate a field bag against a variant schema and return the converted value.
 * All violations are collected; the first one names the offending field.
 */
export function validateFields<T>(schema: Joi.ObjectSchema<T>, fields: FieldBag): T {
  const result = schema.validate(fields, {
    abortEarly: false,
    allowUnknown: false,
    stripUnknown: false,
    errors: { wrap: { label: false } }
  });

  if (result.error !== undefined) {
    const { details, message } = result.error;
    const [first] = details;
    const field = first && first.path.length > 0 ? first.path.join('.') : 'fields';
    const violations = details.map(detail => detail.message);
    throw new ValidationError(field, violations[0] ?? message, violations);
  }

  return result.value;
}

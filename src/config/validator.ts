import Joi from 'joi';
import { LOG_LEVELS } from '../logger';
import { DEFAULT_EVICTION_POLICIES } from '../resources/cache-db';
import { ConfigValidationResult, ConsoleConfig } from './types';

export function createDefaultConfig(): ConsoleConfig {
  return {
    audit: {
      sink: 'file',
      directory: 'logs'
    },
    logging: {
      level: 'warn'
    },
    resources: {
      cache_db: {
        eviction_policies: [...DEFAULT_EVICTION_POLICIES]
      }
    }
  };
}

// Joi schema for the audit section
const auditSettingsSchema = Joi.object({
  sink: Joi.string()
    .valid('file', 'memory')
    .messages({
      'any.only': 'Audit sink must be one of: file, memory'
    }),
  directory: Joi.string()
    .min(1)
    .messages({
      'string.empty': 'Audit directory must not be empty'
    })
});

// Joi schema for the logging section
const loggingSettingsSchema = Joi.object({
  level: Joi.string()
    .valid(...LOG_LEVELS)
    .messages({
      'any.only': `Log level must be one of: ${LOG_LEVELS.join(', ')}`
    })
});

// Joi schema for per-resource settings
const resourceSettingsSchema = Joi.object({
  cache_db: Joi.object({
    eviction_policies: Joi.array()
      .items(
        Joi.string()
          .pattern(/^[A-Za-z0-9_-]+$/)
          .messages({
            'string.pattern.base': 'Eviction policies must contain only letters, digits, hyphens, and underscores'
          })
      )
      .min(1)
      .unique()
      .messages({
        'array.min': 'At least one eviction policy is required',
        'array.unique': 'Eviction policies must not repeat'
      })
  })
});

// Main ConsoleConfig schema
const consoleConfigSchema = Joi.object({
  audit: auditSettingsSchema,
  logging: loggingSettingsSchema,
  resources: resourceSettingsSchema
}).unknown(false);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with the second object taking precedence. Arrays
 * and scalars from `source` replace those in `target`.
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    if (isPlainObject(value) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, value);
    } else if (value !== undefined && value !== null) {
      result[key] = value;
    }
  }

  return result;
}

function withDefaults(config: unknown): unknown {
  if (config === undefined || config === null) {
    return createDefaultConfig();
  }
  if (!isPlainObject(config)) {
    return config;
  }
  return deepMerge({ ...createDefaultConfig() }, config);
}

function validateWithSchema(config: unknown): Joi.ValidationResult<ConsoleConfig> {
  return consoleConfigSchema.validate(withDefaults(config), {
    abortEarly: false,
    allowUnknown: false,
    stripUnknown: false
  });
}

/**
 * Validates a console configuration object against the schema
 * @param config - The configuration object to validate
 * @returns ConfigValidationResult with validation status and any errors
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = validateWithSchema(config);

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  return {
    valid: true,
    errors: []
  };
}

/**
 * Validates a console configuration and fills in defaults
 * @throws Error if validation fails
 */
export function validateAndNormalizeConfig(config: unknown): ConsoleConfig {
  const result = validateWithSchema(config);

  if (result.error !== undefined) {
    const errors = result.error.details.map(detail => detail.message);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.value;
}

/**
 * Gets the Joi schema for console configuration (useful for testing)
 */
export function getConfigSchema(): Joi.ObjectSchema {
  return consoleConfigSchema;
}

import Joi from 'joi';
import type { ConfigValidationResult, ProjectConfig } from './types.js';

const infraSettingsSchema = Joi.object({
  path: Joi.string()
    .default('infra')
    .messages({
      'string.base': 'Infra path must be a string'
    }),
  module: Joi.string()
    .pattern(/^[a-zA-Z0-9-_.]+$/)
    .default('main')
    .messages({
      'string.pattern.base': 'Infra module must be a file name without directories'
    }),
  parameters_file: Joi.string()
    .optional()
    .messages({
      'string.base': 'Parameters file must be a string'
    })
});

const azureSettingsSchema = Joi.object({
  subscription_id: Joi.string()
    .guid()
    .optional()
    .messages({
      'string.guid': 'Subscription id must be a GUID'
    }),
  location: Joi.string()
    .pattern(/^[a-z0-9]+$/)
    .optional()
    .messages({
      'string.pattern.base': 'Location must be a region name such as "eastus2"'
    }),
  resource_group: Joi.string()
    .pattern(/^[-\w._()]{1,90}$/)
    .optional()
    .messages({
      'string.pattern.base': 'Resource group names are up to 90 letters, digits, "-", "_", ".", "(" or ")"'
    })
});

const environmentSettingsSchema = Joi.object({
  name: Joi.string()
    .pattern(/^[a-zA-Z0-9-_.]{1,64}$/)
    .optional()
    .messages({
      'string.pattern.base': 'Environment name must be up to 64 letters, digits, "-", "_" or "."'
    })
});

const projectConfigSchema = Joi.object({
  name: Joi.string()
    .required()
    .pattern(/^[a-zA-Z0-9-_]+$/)
    .max(50)
    .messages({
      'string.pattern.base': 'Project name must contain only alphanumeric characters, hyphens, and underscores',
      'string.max': 'Project name must be no more than 50 characters long'
    }),
  infra: infraSettingsSchema.default(),
  environment: environmentSettingsSchema.optional(),
  azure: azureSettingsSchema.default()
}).unknown(false);

/**
 * Validates a project configuration object against the schema
 * @param config - The configuration object to validate
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = projectConfigSchema.validate(config, { abortEarly: false });

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
 * Validates a project configuration and applies defaults
 * @throws Error if validation fails
 */
export function validateAndNormalizeConfig(config: unknown): ProjectConfig {
  const { error, value } = projectConfigSchema.validate(config, { abortEarly: false });

  if (error) {
    const errors = error.details.map(detail => detail.message);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return value;
}

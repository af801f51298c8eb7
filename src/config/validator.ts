import Joi from 'joi';
import { ProvisioningPlan } from '../types';
import { ConfigValidationError, ConfigValidationResult } from './types';
import { createNamingService } from './naming';

const STEP_KINDS = ['extension', 'login', 'resource-group', 'vm', 'open-port', 'workspace'];

const resourceGroupName = Joi.string()
  .max(90)
  .pattern(/^[-\w.()]*[-\w()]$/)
  .messages({
    'string.pattern.base': 'Resource group name may contain letters, digits, "-", "_", ".", "(", ")" and must not end with "."',
    'string.max': 'Resource group name must be no more than 90 characters long'
  });

const location = Joi.string()
  .pattern(/^[a-z0-9]+$/)
  .messages({
    'string.pattern.base': 'Location must be an Azure region name such as eastus or westeurope'
  });

const label = Joi.string().max(80);

const extensionStepSchema = Joi.object({
  kind: Joi.string().valid('extension').required(),
  label,
  extension: Joi.string()
    .required()
    .pattern(/^[a-z0-9-]+$/)
    .messages({
      'any.required': 'Extension step requires an extension name',
      'string.pattern.base': 'Extension name must contain only lowercase letters, digits, and hyphens'
    })
});

const loginStepSchema = Joi.object({
  kind: Joi.string().valid('login').required(),
  label,
  credentials: Joi.string()
    .required()
    .messages({
      'any.required': 'Login step requires credentials (usually from the AZURE_CREDENTIALS environment variable)'
    })
});

const resourceGroupStepSchema = Joi.object({
  kind: Joi.string().valid('resource-group').required(),
  label,
  resource_group: resourceGroupName,
  location: location.required().messages({
    'any.required': 'Resource group step requires a location'
  })
});

const vmStepSchema = Joi.object({
  kind: Joi.string().valid('vm').required(),
  label,
  resource_group: resourceGroupName,
  name: Joi.string()
    .required()
    .max(64)
    .pattern(/^[a-zA-Z0-9][a-zA-Z0-9._-]*$/)
    .messages({
      'any.required': 'VM step requires a name',
      'string.pattern.base': 'VM name must start with a letter or digit and contain only letters, digits, ".", "_" and "-"',
      'string.max': 'VM name must be no more than 64 characters long'
    }),
  image: Joi.string()
    .required()
    .messages({
      'any.required': 'VM step requires an image'
    }),
  authentication_type: Joi.string()
    .valid('password')
    .default('password')
    .messages({
      'any.only': 'Only password authentication is supported'
    }),
  admin_username: Joi.string()
    .pattern(/^[a-z_][a-z0-9_-]*$/)
    .max(64)
    .default('azureuser')
    .messages({
      'string.pattern.base': 'Admin username must start with a lowercase letter or "_" and contain only lowercase letters, digits, "_" and "-"'
    }),
  admin_password: Joi.string()
    .required()
    .messages({
      'any.required': 'VM step requires an admin password (usually from the VM_PASSWORD environment variable)'
    }),
  dns_name: Joi.string()
    .pattern(/^[a-z][a-z0-9-]{1,61}[a-z0-9]$/)
    .messages({
      'string.pattern.base': 'DNS name must be 3-63 lowercase letters, digits or hyphens, starting with a letter'
    }),
  size: Joi.string(),
  location
});

const portRange = Joi.string()
  .pattern(/^\d+(-\d+)?$/)
  .custom((value: string, helpers) => {
    const [from, to = from] = value.split('-').map(Number);
    if (from < 1 || to > 65535 || from > to) {
      return helpers.error('port.range');
    }
    return value;
  })
  .messages({
    'string.pattern.base': 'Port must be a number or a range such as 8002-8003',
    'port.range': 'Port range must lie within 1-65535 and start no higher than it ends'
  });

const openPortStepSchema = Joi.object({
  kind: Joi.string().valid('open-port').required(),
  label,
  resource_group: resourceGroupName,
  vm: Joi.string()
    .required()
    .messages({
      'any.required': 'Open-port step requires the VM name'
    }),
  port: Joi.alternatives()
    .try(portRange, Joi.number().integer().min(1).max(65535).custom((value: number) => String(value)))
    .required()
    .messages({
      'any.required': 'Open-port step requires a port or port range'
    }),
  priority: Joi.number()
    .integer()
    .min(100)
    .max(4096)
    .default(100)
    .messages({
      'number.min': 'Rule priority must be between 100 and 4096',
      'number.max': 'Rule priority must be between 100 and 4096'
    })
});

const workspaceStepSchema = Joi.object({
  kind: Joi.string().valid('workspace').required(),
  label,
  resource_group: resourceGroupName,
  name: Joi.string()
    .required()
    .min(3)
    .max(33)
    .pattern(/^[a-zA-Z0-9][a-zA-Z0-9_-]*$/)
    .messages({
      'any.required': 'Workspace step requires a name',
      'string.pattern.base': 'Workspace name must start with a letter or digit and contain only letters, digits, "_" and "-"',
      'string.min': 'Workspace name must be at least 3 characters long',
      'string.max': 'Workspace name must be no more than 33 characters long'
    }),
  location: location.required().messages({
    'any.required': 'Workspace step requires a location'
  })
});

const kindIs = (kind: string) => Joi.string().valid(kind).required();

const stepSchema = Joi.alternatives().conditional('.kind', {
  switch: [
    { is: kindIs('extension'), then: extensionStepSchema },
    { is: kindIs('login'), then: loginStepSchema },
    { is: kindIs('resource-group'), then: resourceGroupStepSchema },
    { is: kindIs('vm'), then: vmStepSchema },
    { is: kindIs('open-port'), then: openPortStepSchema },
    { is: kindIs('workspace'), then: workspaceStepSchema }
  ],
  otherwise: Joi.object({
    kind: Joi.string()
      .valid(...STEP_KINDS)
      .required()
      .messages({
        'any.only': `Step kind must be one of: ${STEP_KINDS.join(', ')}`,
        'any.required': 'Every step requires a kind'
      })
  }).unknown(true)
});

// Main ProvisioningPlan schema
const provisioningPlanSchema = Joi.object<ProvisioningPlan>({
  resource_group: resourceGroupName.required().messages({
    'any.required': 'A default resource_group is required'
  }),
  steps: Joi.array()
    .items(stepSchema)
    .min(1)
    .required()
    .messages({
      'array.min': 'A plan must contain at least one step',
      'any.required': 'A plan must list its steps'
    })
}).unknown(false);

function runSchema(config: unknown): { errors: string[]; value?: ProvisioningPlan } {
  const { error, value } = provisioningPlanSchema.validate(config, {
    abortEarly: false,
    allowUnknown: false,
    stripUnknown: false
  });

  if (error) {
    return { errors: error.details.map(detail => detail.message) };
  }

  const duplicates = createNamingService().findDuplicateResources(value);
  if (duplicates.length > 0) {
    return { errors: duplicates.map(name => `Duplicate resource in plan: ${name}`) };
  }

  return { errors: [], value };
}

/**
 * Validates a provisioning plan against the schema
 * @param config - The configuration object to validate
 * @returns ConfigValidationResult with validation status and any errors
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { errors } = runSchema(config);
  return {
    valid: errors.length === 0,
    errors
  };
}

/**
 * Validates a provisioning plan and applies schema defaults
 * @throws ConfigValidationError if validation fails
 */
export function validateAndNormalizeConfig(config: unknown): ProvisioningPlan {
  const { errors, value } = runSchema(config);

  if (!value) {
    throw new ConfigValidationError(`Configuration validation failed:\n${errors.join('\n')}`, errors);
  }

  return value;
}

/**
 * Gets the Joi schema for provisioning plans (useful for testing)
 */
export function getConfigSchema() {
  return provisioningPlanSchema;
}

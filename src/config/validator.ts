import Joi from 'joi';
import { ConfigurationError, ConfigurationIssue } from '../errors';
import { ConfigValidationResult, PlatformConfig } from './types';

const DNS_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const DURATION = /^\d+(ms|s|m|h)$/;

const phaseNameSchema = Joi.string()
  .pattern(DNS_LABEL)
  .max(63)
  .messages({
    'string.pattern.base': '{{#label}} must be a lowercase DNS label (letters, digits and hyphens)',
    'string.max': '{{#label}} must be no more than 63 characters long'
  });

const retryPolicyFields = {
  maxAttempts: Joi.number().integer().min(1).max(20).messages({
    'number.min': 'maxAttempts must be at least 1',
    'number.max': 'maxAttempts must be no more than 20'
  }),
  initialDelayMs: Joi.number().integer().min(0),
  backoffMultiplier: Joi.number().min(1).messages({
    'number.min': 'backoffMultiplier must be at least 1'
  }),
  maxDelayMs: Joi.number().integer().min(0)
};

const fullRetryPolicySchema = Joi.object({
  maxAttempts: retryPolicyFields.maxAttempts.required(),
  initialDelayMs: retryPolicyFields.initialDelayMs.required(),
  backoffMultiplier: retryPolicyFields.backoffMultiplier.required(),
  maxDelayMs: retryPolicyFields.maxDelayMs.required()
});

const partialRetryPolicySchema = Joi.object(retryPolicyFields);

const timeoutSchema = Joi.number().integer().min(1).max(86400).messages({
  'number.min': '{{#label}} must be at least 1 second',
  'number.max': '{{#label}} must be no more than 86400 seconds (24 hours)'
});

const labelsSchema = Joi.object().pattern(Joi.string(), Joi.string()).min(1).messages({
  'object.pattern.match': 'Labels must be key-value pairs of strings',
  'object.min': 'Label selector must name at least one label'
});

const platformSchema = Joi.object({
  name: Joi.string().required().messages({
    'any.required': 'Platform name is required'
  }),
  context: Joi.string().optional(),
  namespace: Joi.string().pattern(DNS_LABEL).required().messages({
    'string.pattern.base': 'Default namespace must be a lowercase DNS label'
  }),
  pollIntervalSeconds: Joi.number().integer().min(1).max(60).required().messages({
    'number.min': 'pollIntervalSeconds must be at least 1',
    'number.max': 'pollIntervalSeconds must be no more than 60'
  }),
  reconcileIntervalSeconds: Joi.number().integer().min(5).required().messages({
    'number.min': 'reconcileIntervalSeconds must be at least 5'
  }),
  concurrency: Joi.number().integer().min(1).max(32).required(),
  conflictGraceSeconds: Joi.number().min(0).required(),
  deleteGraceSeconds: Joi.number().integer().min(0).required()
});

const defaultsSchema = Joi.object({
  timeoutSeconds: timeoutSchema.required(),
  retryPolicy: fullRetryPolicySchema.required()
});

const healthCheckSchema = Joi.object({
  kind: Joi.string().required(),
  apiVersion: Joi.string().optional(),
  name: Joi.string().optional(),
  labels: labelsSchema.optional(),
  namespace: Joi.string().optional(),
  condition: Joi.string()
    .valid('available', 'established', 'materialized', 'synced', 'ready', 'exists')
    .required()
    .messages({
      'any.only': 'Condition must be one of: available, established, materialized, synced, ready, exists'
    }),
  timeoutSeconds: timeoutSchema.optional(),
  required: Joi.boolean().default(true)
})
  .xor('name', 'labels')
  .messages({
    'object.xor': 'A health check selects its target by either name or labels, not both',
    'object.missing': 'A health check needs a name or labels to select its target'
  });

const resourceEntrySchema = Joi.alternatives()
  .try(
    Joi.string(),
    Joi.object({
      path: Joi.string().required(),
      required: Joi.boolean().default(true)
    }),
    Joi.object({
      apiVersion: Joi.string().required(),
      kind: Joi.string().required(),
      metadata: Joi.object({ name: Joi.string().required() }).unknown(true).required()
    }).unknown(true)
  )
  .messages({
    'alternatives.match': 'A resource must be a manifest path, {path, required} or an inline manifest with apiVersion, kind and metadata.name'
  });

const gitopsSchema = Joi.object({
  name: Joi.string().pattern(DNS_LABEL).optional(),
  namespace: Joi.string().default('flux-system'),
  sourceRef: Joi.object({
    kind: Joi.string().valid('GitRepository', 'OCIRepository', 'Bucket').default('GitRepository'),
    name: Joi.string().required(),
    namespace: Joi.string().optional()
  }).required(),
  path: Joi.string().required().messages({
    'any.required': 'GitOps path is required'
  }),
  interval: Joi.string().pattern(DURATION).default('5m').messages({
    'string.pattern.base': 'interval must be a duration such as 30s, 5m or 1h'
  }),
  prune: Joi.boolean().default(true),
  targetNamespace: Joi.string().optional(),
  required: Joi.boolean().default(true)
});

const phaseSchema = Joi.object({
  name: phaseNameSchema.required(),
  dependsOn: Joi.array().items(Joi.string()).unique().default([]).messages({
    'array.unique': 'dependsOn lists a phase more than once'
  }),
  resources: Joi.array().items(resourceEntrySchema).default([]),
  healthChecks: Joi.array().items(healthCheckSchema).default([]),
  timeoutSeconds: timeoutSchema.optional(),
  retryPolicy: partialRetryPolicySchema.optional(),
  optional: Joi.boolean().default(false),
  gitops: gitopsSchema.optional()
});

const secretsSchema = Joi.object({
  phase: phaseNameSchema.default('secrets'),
  dependsOn: Joi.array().items(Joi.string()).unique().default([]),
  address: Joi.string().uri({ scheme: ['http', 'https'] }).optional().messages({
    'string.uri': 'Secrets engine address must be an http(s) URL',
    'string.uriCustomScheme': 'Secrets engine address must be an http(s) URL'
  }),
  auth: Joi.object({
    path: Joi.string().default('kubernetes'),
    kubernetesHost: Joi.string().default('https://kubernetes.default.svc'),
    audience: Joi.string().optional()
  }).default(),
  consumers: Joi.array()
    .items(
      Joi.object({
        name: phaseNameSchema.required(),
        serviceAccount: Joi.string().required(),
        namespace: Joi.string().required(),
        access: Joi.string().valid('read', 'read-write').default('read').messages({
          'any.only': 'Access must be one of: read, read-write'
        }),
        mount: Joi.string().optional()
      })
    )
    .unique('name')
    .min(1)
    .required()
    .messages({
      'array.unique': 'Consumer names must be unique',
      'array.min': 'At least one secrets consumer is required'
    }),
  bindings: Joi.array()
    .items(
      Joi.object({
        consumer: Joi.string().required(),
        secretPath: Joi.string().required(),
        destination: Joi.object({
          name: Joi.string().pattern(DNS_LABEL).required(),
          namespace: Joi.string().optional()
        }).required(),
        refreshInterval: Joi.string().pattern(DURATION).default('1h').messages({
          'string.pattern.base': 'refreshInterval must be a duration such as 30s, 5m or 1h'
        }),
        seed: Joi.object().pattern(Joi.string(), Joi.string()).optional().messages({
          'object.pattern.match': 'Seed values must be key-value pairs of strings'
        })
      })
    )
    .default([]),
  timeoutSeconds: timeoutSchema.optional(),
  retryPolicy: partialRetryPolicySchema.optional()
});

const platformConfigSchema = Joi.object<PlatformConfig>({
  platform: platformSchema.required(),
  defaults: defaultsSchema.required(),
  secrets: secretsSchema.optional(),
  phases: Joi.array().items(phaseSchema).min(1).required().messages({
    'array.min': 'At least one phase is required'
  })
}).unknown(false);

/**
 * `phases.0.healthChecks.1.kind` becomes `phases[0].healthChecks[1].kind`
 */
function formatPath(path: (string | number)[]): string {
  return path.reduce<string>((location, segment) => {
    if (typeof segment === 'number') {
      return `${location}[${segment}]`;
    }
    return location ? `${location}.${segment}` : segment;
  }, '') || 'config';
}

function issuesOf(error: Joi.ValidationError): ConfigurationIssue[] {
  return error.details.map(detail => ({
    location: formatPath(detail.path),
    message: detail.message
  }));
}

/**
 * Validates a platform configuration object against the schema
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = platformConfigSchema.validate(config, { abortEarly: false });
  if (error) {
    return {
      valid: false,
      errors: issuesOf(error).map(issue => `${issue.location}: ${issue.message}`)
    };
  }
  return { valid: true, errors: [] };
}

/**
 * Validates a platform configuration and applies schema defaults
 * @throws ConfigurationError listing every problem found
 */
export function validateAndNormalizeConfig(config: unknown): PlatformConfig {
  const result = platformConfigSchema.validate(config, { abortEarly: false });
  if (result.error !== undefined) {
    throw new ConfigurationError(issuesOf(result.error), 'Configuration validation failed');
  }
  return result.value;
}

/**
 * Gets the Joi schema for platform configuration (useful for testing)
 */
export function getConfigSchema(): Joi.ObjectSchema<PlatformConfig> {
  return platformConfigSchema;
}

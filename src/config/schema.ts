import { z } from 'zod';
import { isIsoDateTime } from '../extraction/schema-inferencer';
import { ConfigurationError } from '../utils/errors';

export const STREAM_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

// characters that have no business in a configured endpoint
const DANGEROUS_URL_CHARACTERS = /[<>"'{}|\\^`\s]/;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Describe what is wrong with a stream name, if anything
 */
export function streamNameProblem(name: string): string | undefined {
  if (name.length === 0) {
    return 'stream name must not be empty';
  }
  if (!STREAM_NAME_PATTERN.test(name)) {
    return `stream name "${name}" is invalid: use lowercase letters, digits and underscores, starting with a letter`;
  }
  return undefined;
}

/**
 * Describe what is wrong with an endpoint URL, if anything
 */
export function endpointUrlProblem(url: string): string | undefined {
  if (url.trim().length === 0) {
    return 'endpoint URL must not be empty';
  }

  const dangerous = DANGEROUS_URL_CHARACTERS.exec(url);
  if (dangerous) {
    return `endpoint URL contains an invalid character: ${JSON.stringify(dangerous[0])}`;
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return `endpoint URL "${url}" is not a valid URL`;
  }

  if (parsed.protocol !== 'https:') {
    return `endpoint URL "${url}" must use HTTPS`;
  }

  // URL() reads "https:///path" as host "path"; require the authority explicitly
  if (parsed.hostname.length === 0 || !/^https:\/\/[^/?#]/i.test(url.trim())) {
    return `endpoint URL "${url}" has no host`;
  }

  return undefined;
}

export function validateStreamName(name: string): void {
  const problem = streamNameProblem(name);
  if (problem) {
    throw new ConfigurationError(problem, ['name']);
  }
}

export function validateEndpointUrl(url: string): void {
  const problem = endpointUrlProblem(url);
  if (problem) {
    throw new ConfigurationError(problem, ['endpoint_url']);
  }
}

export function isIsoDateOrDateTime(value: string): boolean {
  return (ISO_DATE.test(value) || isIsoDateTime(value)) && !Number.isNaN(Date.parse(value));
}

/**
 * Endpoint entries are only shape-checked here. Name and URL rules are applied
 * per stream when it is built, so one bad entry fails only its own stream.
 */
export const EndpointConfigSchema = z.object({
  name: z.string(),
  endpoint_url: z.string()
});

export type EndpointConfig = z.infer<typeof EndpointConfigSchema>;

export const ConnectorConfigSchema = z
  .object({
    api_token: z
      .string({ required_error: 'api_token is required' })
      .refine((token) => token.trim().length > 0, 'api_token is required'),
    start_date: z
      .string()
      .refine(isIsoDateOrDateTime, 'start_date must be an ISO-8601 date or date-time')
      .optional(),
    page_size: z.number().int().min(1).max(1000).default(200),
    inter_page_delay: z.number().min(0).max(30).default(0.5),
    request_timeout: z.number().min(10).max(300).default(60),
    max_retries: z.number().int().min(1).max(10).default(5),
    endpoints: z
      .array(EndpointConfigSchema, { required_error: 'at least one endpoint is required' })
      .min(1, 'at least one endpoint is required')
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.endpoints.forEach((endpoint, index) => {
      if (seen.has(endpoint.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['endpoints', index, 'name'],
          message: `duplicate stream name "${endpoint.name}"`
        });
      }
      seen.add(endpoint.name);
    });
  });

export type ConnectorConfigInput = z.input<typeof ConnectorConfigSchema>;
export type ConnectorConfig = z.infer<typeof ConnectorConfigSchema>;

export const PersistedSyncStateSchema = z.record(
  z
    .object({
      updatedAt: z.string().optional()
    })
    .passthrough()
);

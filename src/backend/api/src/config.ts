/**
 * API Configuration
 *
 * Read from the environment: PORT, LISTINGS_API_URL, LISTINGS_API_TIMEOUT_MS,
 * LOG_LEVEL and ENABLE_SWAGGER.
 *
 * @tested tests/integration/api-endpoints.integration.test.ts
 */

import { z } from 'zod';
import { LogLevelSchema } from '@rentmatch/shared';

const blankAsUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

export const ApiConfigSchema = z.object({
  port: z.preprocess(blankAsUndefined, z.coerce.number().int().min(0).max(65535).default(3000)),
  listingsApiUrl: z.preprocess(blankAsUndefined, z.string().url().default('http://localhost:3000')),
  listingsApiTimeoutMs: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(10000)),
  logLevel: z.preprocess(
    (value) => (typeof value === 'string' ? blankAsUndefined(value.toLowerCase()) : value),
    LogLevelSchema.default('info')
  ),
  enableSwagger: z.boolean(),
});

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

/**
 * Builds the API configuration from environment variables
 *
 * @throws ZodError when a variable is malformed
 */
export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  return ApiConfigSchema.parse({
    port: env.PORT,
    listingsApiUrl: env.LISTINGS_API_URL,
    listingsApiTimeoutMs: env.LISTINGS_API_TIMEOUT_MS,
    logLevel: env.LOG_LEVEL,
    enableSwagger: env.ENABLE_SWAGGER !== 'false',
  });
}

import { z } from 'zod';
import { AccountSchema, PostBackUrlSchema } from './request-schema';

export const ServerEnvironmentSchema = z.enum(['Production', 'Testing']);

export type ServerEnvironment = z.infer<typeof ServerEnvironmentSchema>;

const BaseUrlSchema = z.string().url('server base URL must be an absolute URL');

const ServersSchema = z.object({
  Production: BaseUrlSchema.optional(),
  Testing: BaseUrlSchema.optional(),
});

export type ServerDirectory = z.infer<typeof ServersSchema>;

export const ClientConfigSchema = z
  .object({
    environment: ServerEnvironmentSchema.default('Testing'),
    servers: ServersSchema,
    account: AccountSchema.optional(),
    postBackUrl: PostBackUrlSchema.optional(),
    outputDirectory: z.string().min(1, 'outputDirectory must not be empty').default('./reports'),
    timeoutMs: z.number().int().positive('timeoutMs must be a positive integer').default(30000),
  })
  .refine(config => config.servers[config.environment] !== undefined, config => ({
    message: `no server URL configured for environment "${config.environment}"`,
    path: ['servers', config.environment],
  }));

export type ClientConfigInput = z.input<typeof ClientConfigSchema>;
export type ClientConfig = z.output<typeof ClientConfigSchema>;

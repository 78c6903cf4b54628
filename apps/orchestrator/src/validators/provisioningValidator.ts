import { z } from 'zod';

const nodeNameSchema = z
  .string()
  .trim()
  .min(1, 'Node name must not be empty')
  .max(255, 'Node name must not exceed 255 characters');

const interfaceNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9_.:-]{1,15}$/, 'Interface name must be 1-15 characters of [A-Za-z0-9_.:-]');

const timeoutSchema = (field: string) =>
  z
    .number()
    .int(`${field} must be an integer`)
    .min(1, `${field} must be at least 1ms`)
    .max(3_600_000, `${field} must not exceed one hour`);

export const consoleHostSchema = z
  .string()
  .trim()
  .min(1, 'hostOverride must not be empty')
  .max(255, 'hostOverride must not exceed 255 characters');

export const concurrencySchema = z
  .number()
  .int('concurrency must be an integer')
  .min(1, 'concurrency must be at least 1')
  .max(64, 'concurrency must not exceed 64');

export const provisionRequestSchema = z
  .object({
    hostOverride: consoleHostSchema.optional(),
    only: z.array(nodeNameSchema).max(1_000).optional(),
    interfaces: z.array(interfaceNameSchema).min(1).max(16).optional(),
    attemptTimeoutMs: timeoutSchema('attemptTimeoutMs').optional(),
    nodeTimeoutMs: timeoutSchema('nodeTimeoutMs').optional(),
    dhcpWarmupMs: z.number().int().min(0).max(600_000).optional(),
    concurrency: concurrencySchema.optional(),
    strategies: z.array(z.enum(['dhclient', 'udhcpc', 'dhcpcd'])).min(1).optional(),
    applyStatic: z.boolean().optional(),
  })
  .strict();

export type ProvisionRequest = z.infer<typeof provisionRequestSchema>;

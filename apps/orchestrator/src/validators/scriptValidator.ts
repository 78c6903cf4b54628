import { z } from 'zod';
import { config } from '../config';
import { concurrencySchema, consoleHostSchema } from './provisioningValidator';

const shellSchema = z
  .string()
  .regex(/^[A-Za-z0-9_./-]{1,64}$/, 'shell must be a program name or path')
  .default('sh');

const remotePathSchema = z
  .string()
  .min(1, 'remotePath is required')
  .max(1_024, 'remotePath must not exceed 1024 characters');

const timeoutMsSchema = z
  .number()
  .int('timeoutMs must be an integer')
  .min(1, 'timeoutMs must be at least 1ms')
  .max(3_600_000, 'timeoutMs must not exceed one hour')
  .default(config.scripts.timeoutMs);

export const scriptPushItemSchema = z
  .object({
    nodeName: z.string().trim().min(1, 'nodeName is required'),
    localPath: z.string().min(1, 'localPath is required').max(1_024),
    remotePath: remotePathSchema,
    runAfterUpload: z.boolean().default(false),
    executable: z.boolean().default(true),
    overwrite: z.boolean().default(true),
    timeoutMs: timeoutMsSchema,
    shell: shellSchema,
  })
  .strict();

export const scriptPushRequestSchema = z
  .object({
    scripts: z.array(scriptPushItemSchema).min(1, 'No scripts provided').max(500),
    hostOverride: consoleHostSchema.optional(),
    concurrency: concurrencySchema.optional(),
  })
  .strict();

export const scriptRunItemSchema = z
  .object({
    nodeName: z.string().trim().min(1, 'nodeName is required'),
    remotePath: remotePathSchema,
    shell: shellSchema,
    timeoutMs: timeoutMsSchema,
  })
  .strict();

export const scriptRunRequestSchema = z
  .object({
    runs: z.array(scriptRunItemSchema).min(1, 'No run requests provided').max(500),
    hostOverride: consoleHostSchema.optional(),
    concurrency: concurrencySchema.optional(),
  })
  .strict();

export type ScriptPushItem = z.infer<typeof scriptPushItemSchema>;
export type ScriptPushRequest = z.infer<typeof scriptPushRequestSchema>;
export type ScriptRunItem = z.infer<typeof scriptRunItemSchema>;
export type ScriptRunRequest = z.infer<typeof scriptRunRequestSchema>;

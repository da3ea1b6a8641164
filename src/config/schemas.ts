import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const withId = <T extends object>(schema: T, id: string) => Object.assign(schema, { $id: id });

// Codec behaviour shared by the CLI and embedding callers
export const CodecConfigSchema = z.object({
  strict: z.boolean(),
  warnUnknownVerbs: z.boolean(),
});

export const ContextStoreConfigSchema = z
  .object({
    backend: z.enum(['memory', 'redis']),
    url: z.string().url().optional(),
    keyPrefix: z.string().min(1),
    defaultTtlMs: z.number().int().positive().optional(),
  })
  .refine((cfg) => cfg.backend !== 'redis' || cfg.url !== undefined, {
    message: 'url is required for the redis backend',
    path: ['url'],
  });

export const LoggingConfigSchema = z.object({
  level: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']),
  json: z.boolean(),
  file: z.string().min(1).optional(),
});

export const WireConfigSchema = z.object({
  codec: CodecConfigSchema,
  context: ContextStoreConfigSchema,
  logging: LoggingConfigSchema,
});

export type CodecConfig = z.infer<typeof CodecConfigSchema>;
export type ContextStoreConfig = z.infer<typeof ContextStoreConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type WireConfig = z.infer<typeof WireConfigSchema>;

export const jsonSchemas = {
  codec: withId(zodToJsonSchema(CodecConfigSchema, { target: 'jsonSchema7' }), 'AgentwireCodecConfig'),
  context: withId(zodToJsonSchema(ContextStoreConfigSchema, { target: 'jsonSchema7' }), 'AgentwireContextStoreConfig'),
  logging: withId(zodToJsonSchema(LoggingConfigSchema, { target: 'jsonSchema7' }), 'AgentwireLoggingConfig'),
  wire: withId(zodToJsonSchema(WireConfigSchema, { target: 'jsonSchema7' }), 'AgentwireConfig'),
};

import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../domain/errors/DatasetErrors.js';

const splitSchema = z
  .object({
    path: z.string().min(1),
    maxRecords: z.number().int().positive().optional(),
    output: z.string().min(1).optional(),
  })
  .strict();

const validationSchema = z.discriminatedUnion('strategy', [
  z
    .object({
      strategy: z.literal('structural'),
      requiredRoles: z.array(z.string().min(1)).min(1).optional(),
    })
    .strict(),
  z
    .object({
      strategy: z.literal('schema'),
      schemaPath: z.string().min(1),
      formats: z.boolean().optional(),
    })
    .strict(),
]);

const outputSchema = z
  .object({
    suffix: z
      .string()
      .min(1)
      .regex(/^[^/\\]+$/, 'must not contain path separators'),
    directory: z.string().min(1).optional(),
  })
  .strict();

/** Declarative pipeline configuration, e.g. loaded from a JSON file. */
export const pipelineConfigSchema = z
  .object({
    train: splitSchema,
    eval: splitSchema,
    validation: validationSchema,
    output: outputSchema.default({ suffix: 'valid' }),
    strictFormat: z.boolean().default(false),
    concurrency: z.enum(['sequential', 'parallel']).default('sequential'),
    emptyResult: z.enum(['fatal', 'warn']).optional(),
  })
  .strict();

/** Configuration as written by the user, before defaults are applied. */
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

/** Configuration after validation, with defaults filled in. */
export type PipelineConfig = z.output<typeof pipelineConfigSchema>;

export type ValidationConfig = PipelineConfig['validation'];

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path === '' ? issue.message : `${path}: ${issue.message}`;
  });
}

/** Validate a raw configuration value. Throws `ConfigError` listing every problem found. */
export function parsePipelineConfig(raw: unknown): PipelineConfig {
  const result = pipelineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error), { cause: result.error });
  }
  return result.data;
}

/**
 * Load a JSON configuration file.
 *
 * Relative paths inside the file (inputs, outputs, schema) are resolved
 * against the file's own directory, not the process working directory.
 */
export async function loadPipelineConfig(configPath: string): Promise<PipelineConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(configPath, 'utf-8'));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`${configPath}: ${detail}`], { cause: error });
  }

  const config = parsePipelineConfig(raw);
  const base = dirname(configPath);
  const at = (path: string): string => (isAbsolute(path) ? path : resolve(base, path));
  const atOptional = (path: string | undefined): string | undefined => (path === undefined ? undefined : at(path));

  return {
    ...config,
    train: { ...config.train, path: at(config.train.path), output: atOptional(config.train.output) },
    eval: { ...config.eval, path: at(config.eval.path), output: atOptional(config.eval.output) },
    validation:
      config.validation.strategy === 'schema'
        ? { ...config.validation, schemaPath: at(config.validation.schemaPath) }
        : config.validation,
    output: { ...config.output, directory: atOptional(config.output.directory) },
  };
}

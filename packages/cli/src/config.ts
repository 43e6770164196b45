import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Replace `${VAR}` and `${VAR:-default}` in every string of a parsed JSON document
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const encodingSchema = z.enum(['utf-8', 'utf8', 'latin1', 'ascii', 'utf16le']);

const fileSourceBase = z.object({
  filePath: z.string().min(1),
  encoding: encodingSchema.optional(),
});

const csvSource = fileSourceBase
  .extend({
    type: z.literal('csv'),
    delimiter: z.string().min(1).optional(),
    quote: z.string().min(1).optional(),
  })
  .strict();

const excelSource = fileSourceBase
  .extend({
    type: z.literal('excel'),
    sheet: z.union([z.string().min(1), z.number().int().min(1)]).optional(),
    startRow: z.number().int().min(1).optional(),
  })
  .strict();

const jsonSource = fileSourceBase
  .extend({
    type: z.literal('json'),
    recordsPath: z.string().min(1).optional(),
  })
  .strict();

const sslSchema = z.union([
  z.boolean(),
  z.object({ rejectUnauthorized: z.boolean().optional() }).strict(),
]);

const postgresConnection = z.object({
  connectionString: z.string().min(1).optional(),
  host: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535).optional(),
  database: z.string().min(1).optional(),
  user: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
  ssl: sslSchema.optional(),
  connectTimeoutMs: z.number().int().min(1).max(300_000).optional(),
});

const postgresSource = postgresConnection
  .extend({
    type: z.literal('postgresql'),
    table: z.string().min(1),
    schema: z.string().min(1).optional(),
  })
  .strict();

export const sourceEntrySchema = z.discriminatedUnion('type', [
  csvSource,
  excelSource,
  jsonSource,
  postgresSource,
]);

export type SourceEntry = z.infer<typeof sourceEntrySchema>;

export const eterraExportSchema = z
  .object({
    type: z.literal('excel'),
    filePath: z.string().min(1),
    tabs: z
      .object({
        points: z.string().min(1).default('POINT'),
        analogs: z.string().min(1).default('ANALOG'),
        controls: z.string().min(1).default('CTRL'),
        setpoints: z.string().min(1).default('SETPNT'),
      })
      .strict()
      .default({}),
  })
  .strict();

export type EterraExportEntry = z.infer<typeof eterraExportSchema>;

export const targetSystemSchema = postgresConnection
  .extend({
    type: z.literal('postgresql'),
    table: z.string().min(1).optional(),
    aliasColumn: z.string().min(1).optional(),
    schema: z.string().min(1).optional(),
    batchSize: z.number().int().min(1).max(10_000).optional(),
  })
  .strict();

export type TargetSystemConfig = z.infer<typeof targetSystemSchema>;

const exceptionsSchema = z
  .object({
    aliasSubstitutions: z
      .array(
        z
          .object({
            pointId: z.string().min(1),
            controlPointId: z.string().min(1),
          })
          .strict()
      )
      .optional(),
    excludedPointRtus: z.array(z.string().min(1)).optional(),
    excludedInventoryRtus: z.array(z.string().min(1)).optional(),
  })
  .strict();

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    paths: z
      .object({
        dataDir: z.string().min(1),
        outputDir: z.string().min(1),
        debugDir: z.string().min(1).optional(),
        cacheDir: z.string().min(1).optional(),
      })
      .strict(),
    sources: z
      .object({
        eterraExport: eterraExportSchema,
        matchCompare: sourceEntrySchema,
        inventory: sourceEntrySchema,
        alarmCompare: sourceEntrySchema,
        autoTests: sourceEntrySchema,
        commissioning: sourceEntrySchema,
      })
      .strict(),
    targetSystem: targetSystemSchema.optional(),
    rules: z
      .object({
        libraryPath: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    exceptions: exceptionsSchema.optional(),
    commissioningTests: z
      .object({
        visualCheck: z.string().min(1),
        controlSent: z.string().min(1),
        actionVerified: z.string().min(1),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    for (const [name, entry] of Object.entries(value.sources)) {
      if (entry.type === 'postgresql' && !entry.connectionString && !entry.host) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'Missing connectionString or host for postgresql source',
          path: ['sources', name],
        });
      }
    }

    const target = value.targetSystem;
    if (target && !target.connectionString && !target.host) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Missing connectionString or host for targetSystem',
        path: ['targetSystem'],
      });
    }
  });

export type ConfigFile = z.infer<typeof configFileSchema>;

export function formatZodError(err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid config.json:\n${issues}`;
}

/**
 * Validate an already parsed config document
 * @throws ConfigError
 */
export function parseConfig(document: unknown, options?: EnvExpansionOptions): ConfigFile {
  const expanded = expandEnvVars(document, options);
  const result = configFileSchema.safeParse(expanded);
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

export async function loadConfig(configPath: string, options?: EnvExpansionOptions): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);
  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');
  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (error) {
    throw new ConfigError(
      `Config file ${absolutePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseConfig(parsed, options);
}

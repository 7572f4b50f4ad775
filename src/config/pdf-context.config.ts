import { z } from 'zod';

import { InvalidConfigError } from '../modules/pdf-context/pdf-context.errors';
import { IMAGE_DETAILS, IMAGE_FORMATS } from '../modules/pdf-context/pdf-context.types';

export const PDF_CONTEXT_CONFIG = Symbol('PDF_CONTEXT_CONFIG');

export const DEFAULT_MODEL = 'gpt-4o';

type EnvReader = (key: string) => string | undefined;

const readEnv = (read: EnvReader, ...keys: string[]): string | undefined => {
  for (const key of keys) {
    const trimmed = read(key)?.trim();
    if (trimmed) {
      return trimmed;
    }
  }
  return undefined;
};

const toBool = (value: string | undefined): boolean | undefined => {
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
};

const toNumber = (value: string | undefined): number | undefined => (value === undefined ? undefined : Number(value));

export const loaderConfigSchema = z.object({
  dpi: z.number().int().positive().max(1200).default(150),
  imageFormat: z.enum(IMAGE_FORMATS).default('png')
});

export const builderConfigSchema = z.object({
  systemPrompt: z.string().trim().min(1).optional(),
  includeTextLayer: z.boolean().default(true),
  imageDetail: z.enum(IMAGE_DETAILS).default('high'),
  includeDocumentIndex: z.boolean().default(false)
});

export const engineConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  model: z.string().trim().min(1).default(DEFAULT_MODEL),
  maxTokens: z.number().int().positive().default(4096),
  temperature: z.number().min(0).max(2).default(0),
  timeoutMs: z.number().int().positive().default(60_000),
  maxRetries: z.number().int().min(0).max(10).default(2),
  verbose: z.boolean().default(false)
});

export const pdfContextConfigSchema = z.object({
  loader: loaderConfigSchema.default({}),
  builder: builderConfigSchema.default({}),
  engine: engineConfigSchema.default({})
});

export type LoaderConfig = z.infer<typeof loaderConfigSchema>;
export type LoaderConfigInput = z.input<typeof loaderConfigSchema>;
export type BuilderConfig = z.infer<typeof builderConfigSchema>;
export type BuilderConfigInput = z.input<typeof builderConfigSchema>;
export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type PdfContextConfig = z.infer<typeof pdfContextConfigSchema>;
export type PdfContextConfigInput = z.input<typeof pdfContextConfigSchema>;

/** Validates against `schema` and freezes the result, or throws InvalidConfigError naming every issue. */
export function parseConfig<S extends z.ZodTypeAny>(scope: string, schema: S, input: unknown): Readonly<z.infer<S>> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new InvalidConfigError(scope, issues);
  }
  return Object.freeze(parsed.data);
}

export function loadPdfContextConfig(read: EnvReader = (key) => process.env[key]): PdfContextConfig {
  const input = {
    loader: {
      dpi: toNumber(readEnv(read, 'PDF_DPI')),
      imageFormat: readEnv(read, 'PDF_IMAGE_FORMAT')?.toLowerCase()
    },
    builder: {
      systemPrompt: readEnv(read, 'PDF_CONTEXT_SYSTEM_PROMPT'),
      includeTextLayer: toBool(readEnv(read, 'PDF_CONTEXT_INCLUDE_TEXT_LAYER')),
      imageDetail: readEnv(read, 'PDF_CONTEXT_IMAGE_DETAIL')?.toLowerCase(),
      includeDocumentIndex: toBool(readEnv(read, 'PDF_CONTEXT_INCLUDE_DOCUMENT_INDEX'))
    },
    engine: {
      apiKey: readEnv(read, 'LLM_API_KEY', 'OPENAI_API_KEY', 'OPENROUTER_API_KEY'),
      baseUrl: readEnv(read, 'LLM_BASE_URL', 'OPENAI_BASE_URL'),
      model: readEnv(read, 'LLM_MODEL'),
      maxTokens: toNumber(readEnv(read, 'LLM_MAX_TOKENS')),
      temperature: toNumber(readEnv(read, 'LLM_TEMPERATURE')),
      timeoutMs: toNumber(readEnv(read, 'LLM_TIMEOUT_MS')),
      maxRetries: toNumber(readEnv(read, 'LLM_MAX_RETRIES')),
      verbose: toBool(readEnv(read, 'PDF_CONTEXT_VERBOSE'))
    }
  };

  return parseConfig('pdf-context', pdfContextConfigSchema, input);
}

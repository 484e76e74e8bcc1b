import { config as dotenvConfig } from 'dotenv';
import { join } from 'node:path';
import { z } from 'zod';
import type { Config } from '../types/index.js';
import { getProjectRoot } from './outputPaths.js';

const envPath = join(getProjectRoot(), '.env');
const result = dotenvConfig({ path: envPath, quiet: true });

if (result.error && process.env.DEBUG === 'true') {
  console.error(`[Config] No .env loaded from ${envPath}: ${result.error.message}`);
}

/* ---------- Zod schemas for environment-based config ---------- */

const envInt = (fallback: number) =>
  z.string().optional()
    .transform((v) => (v ? parseInt(v, 10) : fallback))
    .pipe(z.number().int().finite());

const envBool = (fallback: boolean) =>
  z.string().optional()
    .transform((v) => (v === undefined || v === '' ? fallback : v === 'true' || v === '1'));

const envArgs = (fallback: string[]) =>
  z.string().optional()
    .transform((v) => (v === undefined ? fallback : v.split(/\s+/).filter(Boolean)));

const ConfigSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional().default('info'),

  // External decompilers
  LUAU_DECOMPILER_COMMAND: z.string().min(1).optional().default('luau-lifter'),
  LUAU_DECOMPILER_ARGS: envArgs(['--indent', '{indent}']),
  LUAJIT_DECOMPILER_COMMAND: z.string().min(1).optional().default('luajit-decompiler'),
  DECOMPILER_TIMEOUT_MS: envInt(30000).pipe(z.number().min(1000).max(600000)),
  DECOMPILER_MAX_OUTPUT_BYTES: envInt(64 * 1024 * 1024).pipe(z.number().min(1024)),

  // Reattachment output
  EMIT_SYMBOL_TABLE: envBool(false),
  EMIT_LINE_NUMBERS: envBool(false),
  EMIT_VARIABLE_COMMENTS: envBool(false),

  // Performance
  MAX_CONCURRENT_FILES: envInt(4).pipe(z.number().min(1).max(64)),
});

type ParsedEnv = z.infer<typeof ConfigSchema>;

export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);

  let values: ParsedEnv;
  if (parsed.success) {
    values = parsed.data;
  } else {
    const issues = parsed.error.issues.map(
      (i) => `  ${i.path.join('.')}: ${i.message}`
    );
    console.error(`[Config] Validation errors:\n${issues.join('\n')}`);
    console.error('[Config] Falling back to safe defaults for invalid fields');
    values = mergeValidFields(env, parsed.error.issues);
  }

  return {
    logLevel: values.LOG_LEVEL,
    decompiler: {
      luau: {
        command: values.LUAU_DECOMPILER_COMMAND,
        args: values.LUAU_DECOMPILER_ARGS,
      },
      luajit: {
        command: values.LUAJIT_DECOMPILER_COMMAND,
      },
      timeoutMs: values.DECOMPILER_TIMEOUT_MS,
      maxOutputBytes: values.DECOMPILER_MAX_OUTPUT_BYTES,
    },
    output: {
      emitSymbolTable: values.EMIT_SYMBOL_TABLE,
      emitLineNumbers: values.EMIT_LINE_NUMBERS,
      emitVariableComments: values.EMIT_VARIABLE_COMMENTS,
    },
    performance: {
      maxConcurrentFiles: values.MAX_CONCURRENT_FILES,
    },
  };
}

/** Drop the offending variables and re-parse so one bad value does not discard the rest. */
function mergeValidFields(env: NodeJS.ProcessEnv, issues: z.ZodIssue[]): ParsedEnv {
  const invalid = new Set(issues.map((issue) => String(issue.path[0])));
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([key]) => !invalid.has(key))
  );
  return ConfigSchema.parse(cleaned);
}

export function validateConfig(config: Config): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (config.performance.maxConcurrentFiles < 1) {
    errors.push('maxConcurrentFiles must be at least 1');
  }

  if (config.decompiler.timeoutMs < 1000) {
    errors.push('decompiler.timeoutMs must be at least 1000ms');
  }

  if (config.decompiler.maxOutputBytes < 1024) {
    errors.push('decompiler.maxOutputBytes must be at least 1024');
  }

  if (!config.decompiler.luau.command.trim()) {
    errors.push('decompiler.luau.command must not be empty');
  }

  if (!config.decompiler.luajit.command.trim()) {
    errors.push('decompiler.luajit.command must not be empty');
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Configuration management for boostsmith
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { tmpdir } from 'node:os';
import { resolve } from 'node:path';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

const TRUTHY = ['1', 'true', 'yes', 'on'];

// z.coerce.boolean() turns the string "false" into true
const envBoolean = z
  .union([z.boolean(), z.string()])
  .transform((value) =>
    typeof value === 'boolean' ? value : TRUTHY.includes(value.trim().toLowerCase())
  );

const timeoutMs = z.coerce.number().int().nonnegative();

// Configuration schema
const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('production'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  installer: z.object({
    repositoryUrl: z.string().min(1).default('https://github.com/dmlc/xgboost'),
    /** Empty string keeps the repository's default branch */
    sourceRef: z.string().default('master'),
    compilerId: z.string().min(1).default('gcc'),
    workRoot: z.string().min(1).default(tmpdir()),
    /** Installed package probed after the run */
    packageName: z
      .string()
      .regex(/^[A-Za-z][A-Za-z0-9.]*$/, 'must be a valid package name')
      .default('xgboost'),
    /** Subdirectory holding the language binding sources */
    bindingDir: z.string().min(1).default('R-package'),
    /** CMake option switching on the language binding library */
    bindingLibraryFlag: z
      .string()
      .regex(/^[A-Z][A-Z0-9_]*$/, 'must be a CMake option name')
      .default('R_LIB'),
    parallelJobs: z.coerce.number().int().positive().optional(),
    outputTailLines: z.coerce.number().int().positive().default(40),
    keepWorkDir: envBoolean.default(false),
    requireFreshInstall: envBoolean.default(false),
  }),

  tools: z.object({
    git: z.string().min(1).default('git'),
    cmake: z.string().min(1).default('cmake'),
    make: z.string().min(1).default('make'),
    r: z.string().min(1).default('R'),
    rscript: z.string().min(1).default('Rscript'),
  }),

  timeouts: z.object({
    acquiring: timeoutMs.default(600000), // 10 minutes
    configuring: timeoutMs.default(300000), // 5 minutes
    building: timeoutMs.default(3600000), // 60 minutes
    installing: timeoutMs.default(900000), // 15 minutes
    probing: timeoutMs.default(60000),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Parse and validate configuration
function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,

    installer: {
      repositoryUrl: process.env.BOOSTSMITH_REPO_URL,
      sourceRef: process.env.BOOSTSMITH_SOURCE_REF,
      compilerId: process.env.BOOSTSMITH_COMPILER,
      workRoot: process.env.BOOSTSMITH_WORK_ROOT,
      packageName: process.env.BOOSTSMITH_PACKAGE,
      bindingDir: process.env.BOOSTSMITH_BINDING_DIR,
      bindingLibraryFlag: process.env.BOOSTSMITH_BINDING_FLAG,
      parallelJobs: process.env.BOOSTSMITH_JOBS,
      outputTailLines: process.env.BOOSTSMITH_OUTPUT_TAIL_LINES,
      keepWorkDir: process.env.BOOSTSMITH_KEEP_WORKDIR,
      requireFreshInstall: process.env.BOOSTSMITH_REQUIRE_FRESH,
    },

    tools: {
      git: process.env.GIT_BINARY,
      cmake: process.env.CMAKE_BINARY,
      make: process.env.MAKE_BINARY,
      r: process.env.R_BINARY,
      rscript: process.env.RSCRIPT_BINARY,
    },

    timeouts: {
      acquiring: process.env.BOOSTSMITH_TIMEOUT_ACQUIRE_MS,
      configuring: process.env.BOOSTSMITH_TIMEOUT_CONFIGURE_MS,
      building: process.env.BOOSTSMITH_TIMEOUT_BUILD_MS,
      installing: process.env.BOOSTSMITH_TIMEOUT_INSTALL_MS,
      probing: process.env.BOOSTSMITH_TIMEOUT_PROBE_MS,
    },
  };

  return configSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}

// Validate config without loading (for startup checks)
export function validateConfig(): { valid: boolean; errors?: string[] } {
  try {
    loadConfig();
    return { valid: true };
  } catch (error) {
    if (error instanceof z.ZodError) {
      return {
        valid: false,
        errors: error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      };
    }
    throw error;
  }
}

import 'reflect-metadata';
import * as dotenv from 'dotenv';
import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { IsBooleanString, IsIn, IsInt, IsNotEmpty, Matches, Min, validateSync } from 'class-validator';
import type { ValidationError } from 'class-validator';

//
// env module
// Loads settings from the env-defaults file at the package root, an optional .env file in the
// working directory, and process.env (highest precedence). Everything is validated on load.
//

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

const DEFAULTS_PATH = fileURLToPath(new URL('../env-defaults', import.meta.url));

function parseBoolean(value: string): boolean {
  return ['true', '1'].includes(value.trim().toLowerCase());
}

/**
 * Parse an integer, keeping NaN so validation reports the key.
 */
function parseInteger(value: string | undefined): number {
  if (value === undefined || !/^-?\d+$/.test(value.trim())) return NaN;
  return parseInt(value, 10);
}

export class CatalogEnv {
  @IsIn(LOG_LEVELS)
  logLevel: string;

  @IsBooleanString()
  rawTextLogger: string;

  @IsInt()
  @Min(1)
  workerCount: number;

  @IsInt()
  @Min(1)
  sourceTimeoutMs: number;

  @Matches(/^EPSG:\d+$/)
  catalogCrs: string;

  @IsBooleanString()
  rawComputeChecksums: string;

  @IsNotEmpty()
  sourceTimezone: string;

  constructor(vars: Record<string, string | undefined>) {
    this.logLevel = (vars.LOG_LEVEL ?? '').toLowerCase();
    this.rawTextLogger = (vars.TEXT_LOGGER ?? 'false').toLowerCase();
    this.workerCount = parseInteger(vars.WORKER_COUNT);
    this.sourceTimeoutMs = parseInteger(vars.SOURCE_TIMEOUT_MS);
    this.catalogCrs = (vars.CATALOG_CRS ?? '').toUpperCase();
    this.rawComputeChecksums = (vars.COMPUTE_CHECKSUMS ?? 'false').toLowerCase();
    this.sourceTimezone = vars.SOURCE_TIMEZONE ?? '';
  }

  get textLogger(): boolean {
    return parseBoolean(this.rawTextLogger);
  }

  get computeChecksums(): boolean {
    return parseBoolean(this.rawComputeChecksums);
  }
}

/**
 * Get any errors from validating the environment, leaving out the target object itself.
 *
 * @param env - the environment instance, including constraints
 * @returns the validation errors
 */
export function getValidationErrors(env: CatalogEnv): ValidationError[] {
  return validateSync(env, { validationError: { target: false } });
}

/**
 * Read the defaults file, an optional .env file and the process environment.
 *
 * @param dotEnvPath - path to the .env overrides file
 * @returns the merged raw variables
 */
export function loadEnvVars(dotEnvPath = '.env'): Record<string, string | undefined> {
  const defaults = dotenv.parse(fs.readFileSync(DEFAULTS_PATH));
  const overrides = fs.existsSync(dotEnvPath) ? dotenv.parse(fs.readFileSync(dotEnvPath)) : {};
  return { ...defaults, ...overrides, ...process.env };
}

/**
 * Build and validate the environment from raw variables.
 *
 * @param vars - raw variables, snake cased
 * @returns the validated environment
 * @throws Error listing every invalid setting
 */
export function createEnv(vars: Record<string, string | undefined>): CatalogEnv {
  const env = new CatalogEnv(vars);
  const errors = getValidationErrors(env);
  if (errors.length > 0) {
    const problems = errors.map((e) => `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  return env;
}

const env = createEnv(loadEnvVars());

export default env;

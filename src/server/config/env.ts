/**
 * Environment Variable Validation
 *
 * Centralized parsing of all environment variables with defaults.
 * Errors are collected and reported together so a misconfigured deployment
 * fails once with the full list.
 */

// Load dotenv early to ensure environment variables are available before anything reads them
import * as dotenv from 'dotenv';
dotenv.config();

import { logger } from '../utils/logger.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseFloatEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseFloat(value);
  return isNaN(num) ? defaultValue : num;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value === 'true';
}

/**
 * Environment configuration type
 */
export interface Env {
  // Server Configuration
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  MAX_UPLOAD_BYTES: number;

  // Completion API
  OPENAI_API_KEY?: string;
  OPENAI_MODEL: string;
  OPENAI_JSON_MODE: boolean;
  AI_REQUEST_TIMEOUT_MS: number;
  AI_MAX_RETRIES: number;
  AI_RETRY_DELAY_MS: number;

  // Extraction
  EXTRACTION_MAX_CHARS: number;
  EXTRACTION_MAX_PAGES: number;
  LINE_TOTAL_TOLERANCE: number;

  // Commodity group classifier artifacts
  COMMODITY_MODEL_DIR: string;
}

let validatedEnv: Env | null = null;

function isNodeEnv(value: string): value is Env['NODE_ENV'] {
  return value === 'development' || value === 'production' || value === 'test';
}

/**
 * Validate and return environment variables
 * @throws {Error} If required validation fails
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = process.env.NODE_ENV || 'development';
  if (!isNodeEnv(nodeEnv)) {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const port = parseNumericEnv(process.env.PORT, 4000);
  if (port < 1 || port > 65535) {
    errors.push(`PORT: Invalid value "${process.env.PORT}". Must be between 1 and 65535.`);
  }

  const maxUploadBytes = parseNumericEnv(process.env.MAX_UPLOAD_BYTES, 10 * 1024 * 1024);
  if (maxUploadBytes <= 0) {
    errors.push(`MAX_UPLOAD_BYTES: Invalid value "${process.env.MAX_UPLOAD_BYTES}". Must be positive.`);
  }

  const timeoutMs = parseNumericEnv(process.env.AI_REQUEST_TIMEOUT_MS, 30000);
  if (timeoutMs <= 0) {
    errors.push(`AI_REQUEST_TIMEOUT_MS: Invalid value "${process.env.AI_REQUEST_TIMEOUT_MS}". Must be positive.`);
  }

  const maxRetries = parseNumericEnv(process.env.AI_MAX_RETRIES, 1);
  if (maxRetries < 0 || maxRetries > 5) {
    errors.push(`AI_MAX_RETRIES: Invalid value "${process.env.AI_MAX_RETRIES}". Must be between 0 and 5.`);
  }

  const retryDelayMs = parseNumericEnv(process.env.AI_RETRY_DELAY_MS, 1000);
  if (retryDelayMs < 0) {
    errors.push(`AI_RETRY_DELAY_MS: Invalid value "${process.env.AI_RETRY_DELAY_MS}". Must not be negative.`);
  }

  // Roughly 4 characters per token; 12000 chars stays well inside small-context models
  const maxChars = parseNumericEnv(process.env.EXTRACTION_MAX_CHARS, 12000);
  if (maxChars < 500) {
    errors.push(`EXTRACTION_MAX_CHARS: Invalid value "${process.env.EXTRACTION_MAX_CHARS}". Must be at least 500.`);
  }

  const maxPages = parseNumericEnv(process.env.EXTRACTION_MAX_PAGES, 0);
  if (maxPages < 0) {
    errors.push(`EXTRACTION_MAX_PAGES: Invalid value "${process.env.EXTRACTION_MAX_PAGES}". Use 0 for all pages.`);
  }

  const tolerance = parseFloatEnv(process.env.LINE_TOTAL_TOLERANCE, 0.01);
  if (tolerance < 0) {
    errors.push(`LINE_TOTAL_TOLERANCE: Invalid value "${process.env.LINE_TOTAL_TOLERANCE}". Must not be negative.`);
  }

  const apiKey = process.env.OPENAI_API_KEY;
  if (nodeEnv === 'production' && !apiKey) {
    errors.push('OPENAI_API_KEY: Environment variable is required in production.');
  }

  if (errors.length > 0 || !isNodeEnv(nodeEnv)) {
    throw new Error(
      `Environment variable validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}\n\n` +
      `Please check your .env file or environment variables.`
    );
  }

  if (!apiKey && nodeEnv !== 'test') {
    logger.warn('OPENAI_API_KEY is not set. Document extraction requests will fail with ServiceUnavailable.');
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,
    PORT: port,
    MAX_UPLOAD_BYTES: maxUploadBytes,

    OPENAI_API_KEY: apiKey,
    OPENAI_MODEL: process.env.OPENAI_MODEL || 'gpt-4o-mini',
    OPENAI_JSON_MODE: parseBooleanEnv(process.env.OPENAI_JSON_MODE, true),
    AI_REQUEST_TIMEOUT_MS: timeoutMs,
    AI_MAX_RETRIES: maxRetries,
    AI_RETRY_DELAY_MS: retryDelayMs,

    EXTRACTION_MAX_CHARS: maxChars,
    EXTRACTION_MAX_PAGES: maxPages,
    LINE_TOTAL_TOLERANCE: tolerance,

    COMMODITY_MODEL_DIR: process.env.COMMODITY_MODEL_DIR || 'models/commodity-groups',
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}

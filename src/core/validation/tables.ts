/**
 * Compiles the configured validation settings into ValidationTables.
 */
import { ValidationSettingsSchema, type ValidationSettings } from '../config/schema.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { ValidationTables } from './types.js';

export function toValidationTables(
  settings: ValidationSettings = ValidationSettingsSchema.parse({})
): ValidationTables {
  return {
    testPrefix: settings.test_prefix,
    includeMethods: settings.naming.include_methods,
    frameworks: [...settings.frameworks],
    dangerousCalls: settings.dangerous_calls.map((entry) => ({ ...entry })),
    riskyImports: [...settings.risky_imports],
    forbiddenPatterns: settings.forbidden_patterns.map((entry) => ({
      pattern: compilePattern(entry.pattern, 'forbidden_patterns'),
      severity: entry.severity,
      message: entry.message,
    })),
    assertionPatterns: settings.assertion_patterns.map((p) => compilePattern(p, 'assertion_patterns')),
    callableTypes: [...settings.callable_types],
    mockPatterns: settings.mock_patterns.map((p) => compilePattern(p, 'mock_patterns')),
  };
}

/**
 * Tables with every default applied.
 */
export function getDefaultValidationTables(): ValidationTables {
  return toValidationTables();
}

function compilePattern(source: string, field: string): RegExp {
  try {
    return new RegExp(source);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.INVALID_PATTERN,
      `Invalid regular expression in validation.${field}: ${source}`,
      { field, pattern: source, originalError: error instanceof Error ? error.message : String(error) }
    );
  }
}

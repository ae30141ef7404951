/**
 * Tests for the configuration schema.
 */
import { describe, it, expect } from 'vitest';
import {
  ConfigSchema,
  ValidationSettingsSchema,
  DependencySettingsSchema,
  DangerousCallSchema,
  DEFAULT_DANGEROUS_CALLS,
  withDefaults,
} from '../../../../src/core/config/schema.js';

describe('ConfigSchema', () => {
  it('should fill every section from an empty object', () => {
    const config = ConfigSchema.parse({});

    expect(config.validation.frameworks).toEqual(['pytest', 'unittest.mock', 'mock']);
    expect(config.validation.risky_imports).toEqual(['os', 'subprocess', 'sys']);
    expect(config.validation.callable_types).toEqual(['Callable']);
    expect(config.validation.dangerous_calls).toEqual(DEFAULT_DANGEROUS_CALLS);
    expect(config.validation.forbidden_patterns).toHaveLength(3);
    expect(config.logging).toEqual({ level: 'info', timestamps: false });
  });

  it('should treat null sections as missing', () => {
    const config = ConfigSchema.parse({ validation: null, dependencies: null });

    expect(config.validation.test_prefix).toBe('test_');
    expect(config.dependencies.python_executable).toBe('python3');
  });

  it('should reject an unknown log level', () => {
    expect(ConfigSchema.safeParse({ logging: { level: 'trace' } }).success).toBe(false);
  });
});

describe('ValidationSettingsSchema', () => {
  it('should reject an empty test prefix', () => {
    expect(ValidationSettingsSchema.safeParse({ test_prefix: '' }).success).toBe(false);
  });

  it('should keep configured lists as given', () => {
    const settings = ValidationSettingsSchema.parse({ frameworks: ['hypothesis'] });

    expect(settings.frameworks).toEqual(['hypothesis']);
  });
});

describe('DangerousCallSchema', () => {
  it('should default severity to error', () => {
    expect(DangerousCallSchema.parse({ call: 'pickle.loads', label: 'Unsafe deserialization' })).toEqual({
      call: 'pickle.loads',
      severity: 'error',
      label: 'Unsafe deserialization',
    });
  });
});

describe('DependencySettingsSchema', () => {
  it('should reject a non-positive timeout', () => {
    expect(DependencySettingsSchema.safeParse({ timeout_seconds: 0 }).success).toBe(false);
  });
});

describe('withDefaults', () => {
  it('should turn undefined into an empty object before parsing', () => {
    const schema = withDefaults(DependencySettingsSchema);

    expect(schema.parse(undefined).resolver).toBe('static');
  });
});

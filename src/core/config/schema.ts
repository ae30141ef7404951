/**
 * Configuration schema for `.testsmith/config.yaml`.
 * Every field has a default, so an empty file (or none) is a full config.
 */
import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
export function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const SeveritySchema = z.enum(['warning', 'error']);

/** A call target the tree-based check flags, matched on the callee text. */
export const DangerousCallSchema = z.object({
  call: z.string().min(1),
  severity: SeveritySchema.default('error'),
  label: z.string().min(1),
});

/** A regex the textual check flags. */
export const ForbiddenPatternSchema = z.object({
  pattern: z.string().min(1),
  severity: SeveritySchema.default('error'),
  message: z.string().min(1),
});

export const DEFAULT_DANGEROUS_CALLS: z.infer<typeof DangerousCallSchema>[] = [
  { call: 'eval', severity: 'error', label: 'Dangerous function call' },
  { call: 'exec', severity: 'error', label: 'Dangerous function call' },
  { call: 'os.system', severity: 'error', label: 'Shell command execution' },
  { call: 'os.popen', severity: 'error', label: 'Shell command execution' },
  { call: 'subprocess.run', severity: 'error', label: 'Shell command execution' },
  { call: 'subprocess.call', severity: 'error', label: 'Shell command execution' },
  { call: 'subprocess.Popen', severity: 'error', label: 'Shell command execution' },
  { call: 'subprocess.check_output', severity: 'error', label: 'Shell command execution' },
  { call: '__import__', severity: 'error', label: 'Dynamic import' },
  { call: 'importlib.import_module', severity: 'error', label: 'Dynamic import' },
  { call: 'open', severity: 'warning', label: 'File operation' },
];

export const DEFAULT_FORBIDDEN_PATTERNS: z.infer<typeof ForbiddenPatternSchema>[] = [
  {
    pattern: '\\b(?:os\\.system|os\\.popen|subprocess\\.(?:run|call|Popen|check_output)|eval|exec)\\s*\\(',
    severity: 'error',
    message: 'Dangerous system call detected',
  },
  {
    pattern: '\\b(?:__import__|importlib\\.import_module)\\s*\\(',
    severity: 'error',
    message: 'Unsafe import detected',
  },
  {
    pattern: '\\b(?:open|file)\\s*\\(',
    severity: 'warning',
    message: 'Potential file operation detected',
  },
];

/** Name and pattern tables the validator checks run against. */
export const ValidationSettingsSchema = z.object({
  /** Prefix a test function name must start with */
  test_prefix: z.string().min(1).default('test_'),
  naming: withDefaults(z.object({
    /** Count methods of module-level classes as test functions too */
    include_methods: z.boolean().default(false),
  })),
  /** Testing framework / mocking names, any of which must appear in the text */
  frameworks: z.array(z.string().min(1)).default(['pytest', 'unittest.mock', 'mock']),
  dangerous_calls: z.array(DangerousCallSchema).default(DEFAULT_DANGEROUS_CALLS),
  /** Imported modules reported as warnings by the tree-based check */
  risky_imports: z.array(z.string().min(1)).default(['os', 'subprocess', 'sys']),
  forbidden_patterns: z.array(ForbiddenPatternSchema).default(DEFAULT_FORBIDDEN_PATTERNS),
  assertion_patterns: z.array(z.string().min(1)).default([
    'assert\\s+',
    'pytest\\.raises\\(\\)',
    'unittest\\.TestCase\\.assert',
  ]),
  /** Annotation names that make an argument a callable */
  callable_types: z.array(z.string().min(1)).default(['Callable']),
  mock_patterns: z.array(z.string().min(1)).default([
    '@patch\\b',
    'Mock\\(',
    'mocker\\.patch\\b',
  ]),
});

export const ResolverKindSchema = z.enum(['static', 'python']);

/** How imported module names are resolved by the dependency check. */
export const DependencySettingsSchema = z.object({
  resolver: ResolverKindSchema.default('static'),
  /** Modules the static resolver accepts on top of the standard library */
  modules: z.array(z.string().min(1)).default(['pytest']),
  /** Include the Python standard library in the static resolver */
  stdlib: z.boolean().default(true),
  python_executable: z.string().min(1).default('python3'),
  /** Seconds before a python resolver lookup is abandoned */
  timeout_seconds: z.number().positive().default(10),
});

export const LoggingSettingsSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  timestamps: z.boolean().default(false),
});

export const ConfigSchema = z.object({
  validation: withDefaults(ValidationSettingsSchema),
  dependencies: withDefaults(DependencySettingsSchema),
  logging: withDefaults(LoggingSettingsSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ValidationSettings = z.infer<typeof ValidationSettingsSchema>;
export type DependencySettings = z.infer<typeof DependencySettingsSchema>;
export type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;
export type ResolverKind = z.infer<typeof ResolverKindSchema>;

/**
 * Mocking check: when the function under test takes a callable, the test
 * is expected to mock something.
 */
import type { ArgumentSpec } from '../../extraction/types.js';
import type { CheckInput, ValidationCheck, ValidationFinding } from '../types.js';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function callableArguments(args: readonly ArgumentSpec[], callableTypes: string[]): ArgumentSpec[] {
  const matchers = callableTypes.map((name) => new RegExp(`\\b${escapeRegExp(name)}\\b`));
  const namesCallable = (annotation: string) => matchers.some((matcher) => matcher.test(annotation));
  return args.filter(({ typeAnnotation }) => typeAnnotation !== undefined && namesCallable(typeAnnotation));
}

export const mockingCheck: ValidationCheck = {
  id: 'mocking',
  name: 'Mocking Check',
  run({ code, context, tables }: CheckInput): ValidationFinding[] {
    if (!context) return [];

    const callables = callableArguments(context.arguments, tables.callableTypes);
    if (callables.length === 0) return [];
    if (tables.mockPatterns.some((pattern) => pattern.test(code))) return [];

    return [{
      check: 'mocking',
      severity: 'warning',
      message: `Callable argument detected but no mocks found (${callables.map((arg) => arg.name).join(', ')})`,
    }];
  },
};

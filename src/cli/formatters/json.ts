import type { AnalysisResult, ArgumentSpec, CallableSignature } from '../../core/extraction/types.js';
import type { ValidationVerdict } from '../../core/validation/types.js';
import type { IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption. Keys are snake_case.
 */
export class JsonFormatter implements IFormatter {
  formatAnalysis(result: AnalysisResult, sourceId: string): string {
    return JSON.stringify({
      file: sourceId,
      functions: result.functions.map(transformCallable),
      classes: result.classes.map((cls) => ({
        name: cls.name,
        base_names: cls.baseNames,
        docstring: cls.docstring ?? null,
        methods: cls.methods.map(transformCallable),
        start_line: cls.startLine,
        end_line: cls.endLine,
      })),
    }, null, 2);
  }

  formatVerdict(verdict: ValidationVerdict, candidateId: string): string {
    return JSON.stringify({
      file: candidateId,
      is_valid: verdict.isValid,
      error_count: verdict.findings.filter((f) => f.severity === 'error').length,
      warning_count: verdict.findings.filter((f) => f.severity === 'warning').length,
      findings: verdict.findings.map((f) => ({
        check: f.check,
        severity: f.severity,
        message: f.message,
        line: f.line ?? null,
      })),
    }, null, 2);
  }
}

function transformArgument(arg: ArgumentSpec): Record<string, unknown> {
  return {
    name: arg.name,
    type_annotation: arg.typeAnnotation ?? null,
    kind: arg.kind,
  };
}

function transformCallable(fn: CallableSignature): Record<string, unknown> {
  return {
    name: fn.name,
    arguments: fn.arguments.map(transformArgument),
    return_type: fn.returnType ?? null,
    docstring: fn.docstring ?? null,
    start_line: fn.startLine,
    end_line: fn.endLine,
    is_async: fn.isAsync,
  };
}

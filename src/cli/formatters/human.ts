import chalk from 'chalk';
import type {
  AnalysisResult,
  ArgumentSpec,
  CallableSignature,
  ClassSignature,
} from '../../core/extraction/types.js';
import type { ValidationFinding, ValidationVerdict } from '../../core/validation/types.js';
import type { IFormatter, FormatOptions } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'blue' | 'cyan' | 'dim';

/**
 * Renders an argument list the way it would read in a `def` line, without
 * defaults. A bare `*` marks keyword-only arguments that follow no `*args`.
 */
export function formatArguments(args: readonly ArgumentSpec[]): string {
  const parts: string[] = [];
  let starSeen = false;

  for (const arg of args) {
    const annotated = arg.typeAnnotation ? `${arg.name}: ${arg.typeAnnotation}` : arg.name;
    switch (arg.kind) {
      case 'positional':
        parts.push(annotated);
        break;
      case 'variadic_positional':
        starSeen = true;
        parts.push(`*${annotated}`);
        break;
      case 'keyword_only':
        if (!starSeen) {
          parts.push('*');
          starSeen = true;
        }
        parts.push(annotated);
        break;
      case 'variadic_keyword':
        parts.push(`**${annotated}`);
        break;
    }
  }

  return parts.join(', ');
}

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatAnalysis(result: AnalysisResult, sourceId: string): string {
    const lines: string[] = [this.colorize(sourceId, 'cyan')];

    if (result.functions.length === 0 && result.classes.length === 0) {
      lines.push(`   ${this.colorize('(no functions or classes)', 'dim')}`);
      return lines.join('\n');
    }

    if (result.functions.length > 0) {
      lines.push(`   Functions (${result.functions.length}):`);
      for (const fn of result.functions) {
        lines.push(...this.formatCallable(fn, '      '));
      }
    }

    if (result.classes.length > 0) {
      lines.push(`   Classes (${result.classes.length}):`);
      for (const cls of result.classes) {
        lines.push(...this.formatClass(cls));
      }
    }

    return lines.join('\n');
  }

  formatVerdict(verdict: ValidationVerdict, candidateId: string): string {
    const errors = verdict.findings.filter((f) => f.severity === 'error');
    const warnings = verdict.findings.filter((f) => f.severity === 'warning');
    const lines: string[] = [];

    const statusIcon = this.getStatusIcon(verdict.isValid, warnings.length > 0);
    const statusText = this.colorize(
      verdict.isValid ? 'VALID' : 'INVALID',
      verdict.isValid ? 'green' : 'red'
    );
    lines.push(`${statusIcon} ${statusText}: ${candidateId}`);

    if (errors.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize(`ERRORS (${errors.length}):`, 'red')}`);
      lines.push(...errors.map((f) => this.formatFinding(f)));
    }

    if (warnings.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize(`WARNINGS (${warnings.length}):`, 'yellow')}`);
      lines.push(...warnings.map((f) => this.formatFinding(f)));
    }

    return lines.join('\n');
  }

  private formatCallable(fn: CallableSignature, indent: string): string[] {
    const keyword = fn.isAsync ? 'async def' : 'def';
    const returns = fn.returnType ? ` -> ${fn.returnType}` : '';
    const span = this.colorize(`[lines ${fn.startLine}-${fn.endLine}]`, 'dim');
    const lines = [`${indent}${keyword} ${fn.name}(${formatArguments(fn.arguments)})${returns}  ${span}`];
    if (this.options.verbose && fn.docstring) {
      lines.push(`${indent}   ${this.colorize(firstLine(fn.docstring), 'dim')}`);
    }
    return lines;
  }

  private formatClass(cls: ClassSignature): string[] {
    const bases = cls.baseNames.length > 0 ? `(${cls.baseNames.join(', ')})` : '';
    const span = this.colorize(`[lines ${cls.startLine}-${cls.endLine}]`, 'dim');
    const lines = [`      class ${cls.name}${bases}  ${span}`];
    if (this.options.verbose && cls.docstring) {
      lines.push(`         ${this.colorize(firstLine(cls.docstring), 'dim')}`);
    }
    for (const method of cls.methods) {
      lines.push(...this.formatCallable(method, '         '));
    }
    return lines;
  }

  private formatFinding(finding: ValidationFinding): string {
    const source = this.options.verbose ? `[${finding.check}] ` : '';
    return `      ${source}${finding.message}`;
  }

  private getStatusIcon(isValid: boolean, hasWarnings: boolean): string {
    if (!isValid) return this.colorize('✗', 'red');
    return hasWarnings ? this.colorize('⚠', 'yellow') : this.colorize('✓', 'green');
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'blue':
        return chalk.blue(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}

function firstLine(text: string): string {
  return text.trim().split('\n')[0].trim();
}

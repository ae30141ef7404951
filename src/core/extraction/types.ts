/**
 * Signature types produced by the source extractor.
 */

/**
 * How a parameter receives its value.
 * Within one signature the kinds always appear in this order.
 */
export type ArgumentKind =
  | 'positional'
  | 'variadic_positional'
  | 'keyword_only'
  | 'variadic_keyword';

export interface ArgumentSpec {
  readonly name: string;
  /** Declared type as written in the source; absent when unannotated */
  readonly typeAnnotation?: string;
  readonly kind: ArgumentKind;
}

/**
 * A function or method.
 */
export interface CallableSignature {
  readonly name: string;
  readonly arguments: readonly ArgumentSpec[];
  readonly returnType?: string;
  readonly docstring?: string;
  /** 1-based line of the `def` keyword (decorators excluded) */
  readonly startLine: number;
  readonly endLine: number;
  readonly isAsync: boolean;
}

export interface ClassSignature {
  readonly name: string;
  /** Each declared base rendered as text, in declaration order */
  readonly baseNames: readonly string[];
  readonly docstring?: string;
  /** Function definitions found directly in the class body */
  readonly methods: readonly CallableSignature[];
  readonly startLine: number;
  readonly endLine: number;
}

/**
 * Everything extracted from one source file, in pre-order discovery order.
 */
export interface AnalysisResult {
  /** Functions whose enclosing construct is not a class */
  readonly functions: readonly CallableSignature[];
  readonly classes: readonly ClassSignature[];
}

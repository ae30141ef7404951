/**
 * Formatter type definitions.
 */
import type { AnalysisResult } from '../../core/extraction/types.js';
import type { ValidationVerdict } from '../../core/validation/types.js';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Show docstrings and the check each finding came from */
  verbose: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  /**
   * Format the signatures extracted from one source.
   */
  formatAnalysis(result: AnalysisResult, sourceId: string): string;

  /**
   * Format the verdict for one candidate.
   */
  formatVerdict(verdict: ValidationVerdict, candidateId: string): string;
}

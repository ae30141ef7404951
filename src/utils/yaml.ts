/**
 * YAML documents checked against zod schemas. Failures carry the source
 * they came from and never reuse the Python parse-error code.
 */
import { parseDocument } from 'yaml';
import { z } from 'zod';
import { SystemError, ErrorCodes } from './errors.js';
import { readFile } from './file-system.js';

const INLINE_SOURCE = 'YAML input';

/**
 * Parse one YAML document. Only the first reported error is raised.
 */
export function parseYaml(content: string, sourceId: string = INLINE_SOURCE): unknown {
  const document = parseDocument(content);
  const [first] = document.errors;
  if (first) {
    const position = first.linePos?.[0];
    throw new SystemError(
      ErrorCodes.YAML_PARSE_ERROR,
      `Malformed YAML in ${sourceId}: ${first.message.split('\n')[0]}`,
      { sourceId, line: position?.line, column: position?.col }
    );
  }
  return document.toJS();
}

/**
 * Parse a YAML document and validate it. Schema defaults are applied.
 */
export function parseYamlWithSchema<T extends z.ZodTypeAny>(
  content: string,
  schema: T,
  sourceId: string = INLINE_SOURCE
): z.infer<T> {
  const result = schema.safeParse(parseYaml(content, sourceId));
  if (result.success) {
    return result.data;
  }
  throw new SystemError(
    ErrorCodes.INVALID_CONFIG,
    `Invalid values in ${sourceId}: ${describeIssues(result.error)}`,
    { sourceId, issues: result.error.issues }
  );
}

/**
 * Read a YAML file and validate it.
 */
export async function loadYamlWithSchema<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T
): Promise<z.infer<T>> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.NOT_FOUND,
      `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { sourceId: filePath }
    );
  }
  return parseYamlWithSchema(content, schema, filePath);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Cleanup of raw generator output before it is validated.
 */

const FENCE_OPEN = '```python';
const FENCE_CLOSE = '```';
const THINK_OPEN = '<think>';
const THINK_CLOSE = '</think>';

/**
 * Strips a surrounding ```python fence and a <think>...</think> block.
 * Text without either comes back trimmed.
 */
export function extractCandidateCode(text: string): string {
  let code = text.trim();

  if (code.startsWith(FENCE_OPEN) && code.endsWith(FENCE_CLOSE)) {
    const lines = code.split(/\r?\n/);
    if (lines.length >= 3) {
      code = lines.slice(1, -1).join('\n').trim();
    }
  }

  const thinkStart = code.indexOf(THINK_OPEN);
  const thinkEnd = code.indexOf(THINK_CLOSE);
  if (thinkStart !== -1 && thinkEnd > thinkStart) {
    code = (code.slice(0, thinkStart) + code.slice(thinkEnd + THINK_CLOSE.length)).trim();
  }

  return code;
}

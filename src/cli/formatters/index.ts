export type { IFormatter, FormatOptions } from './types.js';
export { HumanFormatter, formatArguments } from './human.js';
export { JsonFormatter } from './json.js';

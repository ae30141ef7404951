export * from './types.js';
export { ALL_CHECKS, CodeValidator, validateCandidate, type CodeValidatorOptions } from './engine.js';
export { toValidationTables, getDefaultValidationTables } from './tables.js';
export {
  createStaticResolver,
  createDefaultResolver,
  createPythonResolver,
  createResolver,
  getStdlibModules,
  type PythonResolverOptions,
} from './resolvers.js';
export { extractCandidateCode } from './candidate.js';
export * from './checks/index.js';

/**
 * Source extraction exports.
 */
export * from './types.js';
export { extractSignatures, extractFile, findCallable, type ExtractOptions } from './extractor.js';
export { extractCallableSignature, extractClassSignature, extractArguments, extractDocstring } from './signature.js';
export { buildParentMap, enclosingConstruct, isClassMember, type ParentMap } from './parent-map.js';

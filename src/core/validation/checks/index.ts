export { syntaxCheck } from './syntax.js';
export { forbiddenConstructsCheck } from './forbidden-constructs.js';
export { structureCheck } from './structure.js';
export { namingCheck } from './naming.js';
export { assertionsCheck } from './assertions.js';
export { mockingCheck } from './mocking.js';
export { dependenciesCheck } from './dependencies.js';

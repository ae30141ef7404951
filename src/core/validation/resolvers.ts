/**
 * Module resolution oracles for the dependency check.
 */
import { spawnSync } from 'node:child_process';
import { readFileSync } from 'node:fs';
import type { DependencySettings } from '../config/schema.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import type { ModuleResolver } from './types.js';

const STDLIB_MODULES_URL = new URL('../../../data/python-stdlib-modules.json', import.meta.url);

let stdlibModules: string[] | undefined;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

/**
 * Top-level names of the Python standard library, read once.
 */
export function getStdlibModules(): string[] {
  if (!stdlibModules) {
    const parsed: unknown = JSON.parse(readFileSync(STDLIB_MODULES_URL, 'utf-8'));
    if (!isStringArray(parsed)) {
      throw new SystemError(
        ErrorCodes.RESOLVER_FAILED,
        'Standard library module list is not an array of strings'
      );
    }
    stdlibModules = parsed;
  }
  return stdlibModules;
}

/**
 * Resolves a name when the full dotted name or its top-level package is known.
 */
export function createStaticResolver(modules: Iterable<string>): ModuleResolver {
  const known = new Set(modules);
  return (moduleName) => known.has(moduleName) || known.has(moduleName.split('.')[0]);
}

/**
 * Standard library plus the given extra modules.
 */
export function createDefaultResolver(extra: Iterable<string> = []): ModuleResolver {
  return createStaticResolver([...getStdlibModules(), ...extra]);
}

export interface PythonResolverOptions {
  executable?: string;
  timeoutSeconds?: number;
}

const FIND_SPEC_SCRIPT = [
  'import importlib.util, sys',
  'try:',
  '    found = importlib.util.find_spec(sys.argv[1]) is not None',
  'except (ImportError, ValueError):',
  '    found = False',
  'sys.exit(0 if found else 1)',
].join('\n');

/**
 * Asks a Python interpreter whether the module can be found. Each call
 * spawns one process.
 *
 * @throws SystemError when the interpreter cannot be run or gives no answer
 */
export function createPythonResolver(options: PythonResolverOptions = {}): ModuleResolver {
  const executable = options.executable ?? 'python3';
  const timeout = (options.timeoutSeconds ?? 10) * 1000;

  return (moduleName) => {
    const result = spawnSync(executable, ['-c', FIND_SPEC_SCRIPT, moduleName], {
      encoding: 'utf-8',
      timeout,
    });

    if (result.error) {
      throw new SystemError(
        ErrorCodes.RESOLVER_FAILED,
        `could not run ${executable}: ${result.error.message}`,
        { moduleName }
      );
    }
    if (result.status === 0) return true;
    if (result.status === 1) return false;

    throw new SystemError(
      ErrorCodes.RESOLVER_FAILED,
      `${executable} exited with ${result.status ?? result.signal ?? 'unknown status'} while resolving ${moduleName}`,
      { moduleName, stderr: result.stderr }
    );
  };
}

/**
 * Picks the resolver the dependency settings ask for.
 */
export function createResolver(settings: DependencySettings): ModuleResolver {
  if (settings.resolver === 'python') {
    return createPythonResolver({
      executable: settings.python_executable,
      timeoutSeconds: settings.timeout_seconds,
    });
  }
  return settings.stdlib
    ? createDefaultResolver(settings.modules)
    : createStaticResolver(settings.modules);
}

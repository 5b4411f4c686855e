/**
 * Compiler root resolution.
 *
 * The environment is injected so the core reads no process-wide state.
 */

import { existsSync } from 'fs';
import { posix, resolve } from 'path';

/**
 * Environment variable overriding the compiler root.
 */
export const COMPILER_ROOT_ENV = 'CMSIS_COMPILER_ROOT';

/**
 * Capabilities needed to locate the compiler root.
 */
export interface CompilerRootEnvironment {
  /** Read an environment variable */
  getEnv(name: string): string | undefined;

  /** Path of the running tool's executable */
  getExecutablePath(): string;

  /** Check that a path exists */
  exists(path: string): boolean;

  /** Make a path absolute and normalized */
  canonicalize(path: string): string;
}

function toForwardSlashes(path: string): string {
  return path.replace(/\\/g, '/');
}

/**
 * Resolve the compiler root directory.
 *
 * Order: `CMSIS_COMPILER_ROOT`, then `<install dir>/etc` where the install
 * dir is the parent of the executable's directory. The result uses forward
 * slashes; '' when neither source yields a directory.
 *
 * @param environment - Injected environment
 * @returns Compiler root, or ''
 */
export function resolveCompilerRoot(environment: CompilerRootEnvironment): string {
  let compilerRoot = environment.getEnv(COMPILER_ROOT_ENV) ?? '';

  if (!compilerRoot) {
    const executable = toForwardSlashes(environment.getExecutablePath());
    const installDir = posix.dirname(posix.dirname(executable));
    const candidate = posix.join(installDir, 'etc');
    compilerRoot = environment.exists(candidate) ? candidate : '';
  }

  return compilerRoot ? toForwardSlashes(environment.canonicalize(compilerRoot)) : '';
}

/**
 * Environment bound to the current Node.js process.
 */
export const nodeCompilerRootEnvironment: CompilerRootEnvironment = {
  getEnv: (name) => process.env[name],
  getExecutablePath: () => process.argv[1] || process.execPath,
  exists: (path) => existsSync(path),
  canonicalize: (path) => resolve(path),
};

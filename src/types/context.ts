/**
 * Context and output types.
 */

/**
 * Parsed `<project>[.<build-type>][+<target-type>]` entry.
 */
export interface ContextName {
  project: string;
  build: string;
  target: string;
}

/**
 * Single output artifact toggle.
 */
export interface OutputType {
  on: boolean;
  filename: string;
}

/**
 * Output artifact selection. Toggles are independent of each other.
 */
export interface OutputTypes {
  bin: OutputType;
  elf: OutputType;
  hex: OutputType;
  lib: OutputType;

  /** Secure-library (CMSE import library) */
  cmse: OutputType;
}

/**
 * Shell command result: captured stdout and process exit code.
 * A command that cannot be launched yields an exit code of -1, one
 * terminated by a signal -2.
 */
export interface ExecResult {
  output: string;
  exitCode: number;
}

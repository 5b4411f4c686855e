/**
 * Output artifact selection and toolchain-specific file names.
 */

import type { OutputType, OutputTypes } from '../types/context.js';

export const OUTPUT_TYPE_BIN = 'bin';
export const OUTPUT_TYPE_ELF = 'elf';
export const OUTPUT_TYPE_HEX = 'hex';
export const OUTPUT_TYPE_LIB = 'lib';
export const OUTPUT_TYPE_CMSE = 'cmse-lib';

const OUTPUT_KEYS: ReadonlyArray<keyof OutputTypes> = ['bin', 'elf', 'hex', 'lib', 'cmse'];

/**
 * Output type name -> OutputTypes key.
 */
const OUTPUT_TYPE_KEYS: Readonly<Record<string, keyof OutputTypes>> = {
  [OUTPUT_TYPE_BIN]: 'bin',
  [OUTPUT_TYPE_ELF]: 'elf',
  [OUTPUT_TYPE_HEX]: 'hex',
  [OUTPUT_TYPE_LIB]: 'lib',
  [OUTPUT_TYPE_CMSE]: 'cmse',
};

/**
 * Toolchain file name affixes.
 */
export interface OutputAffixes {
  elfSuffix: string;
  libPrefix: string;
  libSuffix: string;
}

export const DEFAULT_OUTPUT_AFFIXES: Readonly<OutputAffixes> = Object.freeze({
  elfSuffix: '.elf',
  libPrefix: '',
  libSuffix: '.a',
});

const TOOLCHAIN_AFFIXES: Readonly<Record<string, OutputAffixes>> = {
  AC6: { elfSuffix: '.axf', libPrefix: '', libSuffix: '.lib' },
  GCC: { elfSuffix: '.elf', libPrefix: 'lib', libSuffix: '.a' },
  IAR: { elfSuffix: '.out', libPrefix: '', libSuffix: '.a' },
};

export const CMSE_LIB_SUFFIX = '_CMSE_Lib.o';

function off(): OutputType {
  return { on: false, filename: '' };
}

/**
 * Create an output selection with every toggle off.
 */
export function createOutputTypes(): OutputTypes {
  return { bin: off(), elf: off(), hex: off(), lib: off(), cmse: off() };
}

function copyOutputTypes(types: OutputTypes): OutputTypes {
  return {
    bin: { ...types.bin },
    elf: { ...types.elf },
    hex: { ...types.hex },
    lib: { ...types.lib },
    cmse: { ...types.cmse },
  };
}

/**
 * Switch on one output type.
 * Unknown type names leave the selection unchanged.
 *
 * @param typeString - `bin`, `elf`, `hex`, `lib` or `cmse-lib`
 * @param types - Current selection (not mutated)
 * @returns New selection
 */
export function setOutputType(typeString: string, types: OutputTypes): OutputTypes {
  const next = copyOutputTypes(types);
  const key = Object.hasOwn(OUTPUT_TYPE_KEYS, typeString)
    ? OUTPUT_TYPE_KEYS[typeString]
    : undefined;
  if (key) {
    next[key].on = true;
  }
  return next;
}

/**
 * Get file name affixes for a toolchain (AC6, GCC, IAR).
 * The compiler name is taken up to any `@` version clause.
 *
 * @param compiler - Compiler name or specifier
 * @returns Affixes; defaults for unknown toolchains
 */
export function getOutputAffixes(compiler: string): OutputAffixes {
  const [toolchain = ''] = compiler.split('@');
  return Object.hasOwn(TOOLCHAIN_AFFIXES, toolchain)
    ? { ...TOOLCHAIN_AFFIXES[toolchain] }
    : { ...DEFAULT_OUTPUT_AFFIXES };
}

/**
 * Fill the file name of every enabled output type.
 *
 * @param types - Current selection (not mutated)
 * @param baseName - Output base name (usually the project name)
 * @param compiler - Compiler name or specifier
 * @returns New selection with file names
 */
export function assignOutputFilenames(
  types: OutputTypes,
  baseName: string,
  compiler: string
): OutputTypes {
  const { elfSuffix, libPrefix, libSuffix } = getOutputAffixes(compiler);
  const filenames: Record<keyof OutputTypes, string> = {
    bin: `${baseName}.bin`,
    elf: `${baseName}${elfSuffix}`,
    hex: `${baseName}.hex`,
    lib: `${libPrefix}${baseName}${libSuffix}`,
    cmse: `${baseName}${CMSE_LIB_SUFFIX}`,
  };

  const next = copyOutputTypes(types);
  for (const key of OUTPUT_KEYS) {
    if (next[key].on) {
      next[key].filename = filenames[key];
    }
  }
  return next;
}

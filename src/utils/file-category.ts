/**
 * File category classification by extension.
 */

import { posix } from 'path';

export type FileCategory =
  | 'doc'
  | 'header'
  | 'library'
  | 'linkerScript'
  | 'object'
  | 'sourceAsm'
  | 'sourceC'
  | 'sourceCpp'
  | 'other';

/**
 * Category -> extensions (case-sensitive, with leading dot).
 * Looked up in this order; the first category listing the extension wins.
 */
export const FILE_CATEGORIES: ReadonlyArray<readonly [FileCategory, readonly string[]]> = [
  ['doc', ['.txt', '.md', '.pdf', '.htm', '.html']],
  ['header', ['.h', '.hpp']],
  ['library', ['.a', '.lib']],
  ['linkerScript', ['.sct', '.scf', '.ld', '.icf']],
  ['object', ['.o']],
  ['sourceAsm', ['.asm', '.s', '.S']],
  ['sourceC', ['.c', '.C']],
  ['sourceCpp', ['.cpp', '.c++', '.C++', '.cxx', '.cc', '.CC']],
];

/**
 * Classify a file by its extension.
 * Both `/` and `\` are accepted as path separators.
 *
 * @param file - File name or path
 * @returns Category, or 'other' for unknown extensions
 */
export function getCategory(file: string): FileCategory {
  const extension = posix.extname(file.replace(/\\/g, '/'));
  for (const [category, extensions] of FILE_CATEGORIES) {
    if (extensions.includes(extension)) {
      return category;
    }
  }
  return 'other';
}

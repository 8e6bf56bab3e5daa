/**
 * @fileOverview: Language detection for uploaded source files
 * @module: LanguageUtils
 * @keyFunctions:
 *   - getLanguageFromPath: Detect the language and its nameable constructs from a file extension
 *   - isSupportedFile: Extension allow-list check for uploads
 * @context: Feeds the file-analysis intent string and the code fence of the analysis prompt
 */

import * as path from 'path';

export interface LanguageInfo {
  id: string;
  label: string;
  /** Kinds of identifiers the naming rules cover for this language. */
  nameKinds: string;
}

const CODE_NAME_KINDS = 'class, function, method, variable and constant';

const LANGUAGES: Record<string, LanguageInfo> = {
  '.java': { id: 'java', label: 'Java', nameKinds: CODE_NAME_KINDS },
  '.kt': { id: 'kotlin', label: 'Kotlin', nameKinds: CODE_NAME_KINDS },
  '.js': { id: 'javascript', label: 'JavaScript', nameKinds: CODE_NAME_KINDS },
  '.jsx': { id: 'javascript', label: 'JavaScript', nameKinds: 'component, function, variable and constant' },
  '.ts': { id: 'typescript', label: 'TypeScript', nameKinds: CODE_NAME_KINDS },
  '.tsx': { id: 'typescript', label: 'TypeScript', nameKinds: 'component, function, variable and constant' },
  '.py': { id: 'python', label: 'Python', nameKinds: 'class, function, variable and constant' },
  '.cs': { id: 'csharp', label: 'C#', nameKinds: CODE_NAME_KINDS },
  '.go': { id: 'go', label: 'Go', nameKinds: 'type, function, variable and constant' },
  '.sql': { id: 'sql', label: 'Database', nameKinds: 'table, column, index and function' },
  '.txt': { id: 'text', label: 'Text', nameKinds: 'identifier' },
};

export const SUPPORTED_EXTENSIONS: readonly string[] = Object.keys(LANGUAGES);

export function isSupportedFile(fileName: string): boolean {
  return path.extname(fileName).toLowerCase() in LANGUAGES;
}

export function getLanguageFromPath(filePath: string): LanguageInfo {
  const ext = path.extname(filePath).toLowerCase();
  return LANGUAGES[ext] ?? { id: 'unknown', label: 'Source', nameKinds: 'identifier' };
}

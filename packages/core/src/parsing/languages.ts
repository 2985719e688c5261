import { LanguageTag } from '../types.js';

/**
 * Node-type roles for one grammar. Every supported language supplies the
 * full table, so adding a language is a type error until it is described.
 */
export interface LanguageSyntax {
  /** Node types that count as a function definition. */
  definitionTypes: ReadonlySet<string>;
  /** Field of the definition node searched for the function name. */
  nameField: string;
  /**
   * Node type, found inside the name field's subtree, that carries the
   * parameter list. `null` means the definition node carries it directly.
   */
  parametersHost: string | null;
  parametersField: string;
  returnTypeField: string;
  /** Node types that count as a call expression. */
  callTypes: ReadonlySet<string>;
  /** Field of the call node searched for the callee name. */
  calleeField: string;
  /**
   * Wrapping applied to a standalone function body before it is parsed on
   * its own. Java method declarations only parse inside a class body.
   */
  fragment: { prefix: string; suffix: string } | null;
}

const C_FAMILY: Omit<LanguageSyntax, 'fragment'> = {
  definitionTypes: new Set(['function_definition']),
  nameField: 'declarator',
  parametersHost: 'function_declarator',
  parametersField: 'parameters',
  returnTypeField: 'type',
  callTypes: new Set(['call_expression']),
  calleeField: 'function',
};

export const LANGUAGE_SYNTAX = {
  c: { ...C_FAMILY, fragment: null },
  cpp: { ...C_FAMILY, fragment: null },
  java: {
    definitionTypes: new Set(['method_declaration']),
    nameField: 'name',
    parametersHost: null,
    parametersField: 'parameters',
    returnTypeField: 'type',
    callTypes: new Set(['method_invocation']),
    calleeField: 'name',
    fragment: { prefix: 'class Fragment {\n', suffix: '\n}' },
  },
} satisfies Record<LanguageTag, LanguageSyntax>;

export const EXTENSION_LANGUAGE_MAP: Record<string, LanguageTag> = {
  '.c': 'c',
  '.h': 'c',
  '.cc': 'cpp',
  '.cpp': 'cpp',
  '.cxx': 'cpp',
  '.hpp': 'cpp',
  '.hh': 'cpp',
  '.hxx': 'cpp',
  '.java': 'java',
};

export const SUPPORTED_LANGUAGES: readonly LanguageTag[] = ['c', 'cpp', 'java'];

/**
 * Classify a path by its extension. Returns `null` for anything outside the
 * supported set; such files are excluded from every scan.
 */
export function languageOf(filePath: string): LanguageTag | null {
  const fileName = filePath.split('/').pop() ?? '';
  const lastDot = fileName.lastIndexOf('.');
  if (lastDot === -1) return null;

  const ext = fileName.slice(lastDot).toLowerCase();
  return EXTENSION_LANGUAGE_MAP[ext] ?? null;
}

export function syntaxFor(language: LanguageTag): LanguageSyntax {
  return LANGUAGE_SYNTAX[language];
}

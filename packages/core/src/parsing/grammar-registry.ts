import Parser from 'tree-sitter';
import C from 'tree-sitter-c';
import Cpp from 'tree-sitter-cpp';
import Java from 'tree-sitter-java';
import { LanguageTag } from '../types.js';

const GRAMMARS = {
  c: C,
  cpp: Cpp,
  java: Java,
} satisfies Record<LanguageTag, unknown>;

/** Inputs longer than the binding's default buffer need an explicit size. */
const MIN_BUFFER_SIZE = 32 * 1024;

/**
 * Owns one tree-sitter parser per supported language.
 *
 * Construct it once and pass it to every parse or extract call; nothing in
 * this package keeps a grammar or parser in module state.
 */
export class GrammarRegistry {
  private readonly parsers = new Map<LanguageTag, Parser>();

  parse(source: string, language: LanguageTag): Parser.Tree {
    const bufferSize = Math.max(MIN_BUFFER_SIZE, source.length * 2 + 1);
    return this.parserFor(language).parse(source, undefined, { bufferSize });
  }

  private parserFor(language: LanguageTag): Parser {
    let parser = this.parsers.get(language);
    if (!parser) {
      parser = new Parser();
      parser.setLanguage(GRAMMARS[language]);
      this.parsers.set(language, parser);
    }
    return parser;
  }
}

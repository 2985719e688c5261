import { describe, it, expect } from 'vitest';
import { GrammarRegistry } from '../src/parsing/grammar-registry.js';
import { parseFunctions, scanFunctions } from '../src/parsing/source-parser.js';

const registry = new GrammarRegistry();

const C_SOURCE = [
  '#include <stdio.h>',
  '',
  'int add(int a, int b) {',
  '    return a + b;',
  '}',
  '',
  'static char *dup_str(const char *s) {',
  '    return strdup(s);',
  '}',
].join('\n');

const JAVA_SOURCE = [
  'public class Greeter {',
  '    public String greet(String name) {',
  '        return format(name);',
  '    }',
  '',
  '    private static void log(String msg) {',
  '        System.out.println(msg);',
  '    }',
  '}',
].join('\n');

describe('parseFunctions', () => {
  // ── C ──

  it('extracts C function definitions in document order', () => {
    const functions = parseFunctions(registry, C_SOURCE, 'c', 'src/util.c');

    expect(functions.map((fn) => fn.name)).toEqual(['add', 'dup_str']);
  });

  it('records name, signature, return type, code and 1-based lines', () => {
    const [add] = parseFunctions(registry, C_SOURCE, 'c', 'src/util.c');

    expect(add).toEqual({
      name: 'add',
      filePath: 'src/util.c',
      language: 'c',
      signature: '(int a, int b)',
      returnType: 'int',
      code: 'int add(int a, int b) {\n    return a + b;\n}',
      startLine: 3,
      endLine: 5,
    });
  });

  it('finds the parameter list of a pointer-returning function', () => {
    const dup = parseFunctions(registry, C_SOURCE, 'c')[1];

    expect(dup.name).toBe('dup_str');
    expect(dup.signature).toBe('(const char *s)');
    expect(dup.returnType).toBe('char');
    expect(dup.startLine).toBe(7);
    expect(dup.endLine).toBe(9);
  });

  it('defaults filePath to an empty string', () => {
    const [add] = parseFunctions(registry, C_SOURCE, 'c');
    expect(add.filePath).toBe('');
  });

  it('returns an empty list for a file with no functions', () => {
    expect(parseFunctions(registry, '', 'c')).toEqual([]);
    expect(parseFunctions(registry, '#define MAX 10\nint counter;\n', 'c')).toEqual([]);
  });

  it('keeps definitions that precede a syntax error', () => {
    const source = [
      'int good(void) {',
      '    return 1;',
      '}',
      '',
      'int also_good(int x) {',
      '    return x;',
      '}',
      '',
      'int broken(int x {',
    ].join('\n');

    const names = parseFunctions(registry, source, 'c').map((fn) => fn.name);

    expect(names).toEqual(expect.arrayContaining(['good', 'also_good']));
  });

  it('is deterministic for the same input', () => {
    expect(parseFunctions(registry, C_SOURCE, 'c')).toEqual(parseFunctions(registry, C_SOURCE, 'c'));
  });

  // ── C++ ──

  it('names an out-of-class C++ method by its unqualified name', () => {
    const source = 'void Widget::draw(int depth) {\n    paint(depth);\n}\n';

    const [draw] = parseFunctions(registry, source, 'cpp', 'src/widget.cpp');

    expect(draw.name).toBe('draw');
    expect(draw.signature).toBe('(int depth)');
    expect(draw.returnType).toBe('void');
    expect(draw.language).toBe('cpp');
  });

  // ── Java ──

  it('extracts Java methods nested in a class', () => {
    const functions = parseFunctions(registry, JAVA_SOURCE, 'java', 'src/Greeter.java');

    expect(functions.map((fn) => fn.name)).toEqual(['greet', 'log']);
    expect(functions[0]).toMatchObject({
      signature: '(String name)',
      returnType: 'String',
      startLine: 2,
      endLine: 4,
    });
    expect(functions[1]).toMatchObject({
      signature: '(String msg)',
      returnType: 'void',
      startLine: 6,
      endLine: 8,
    });
  });
});

describe('scanFunctions', () => {
  it('pairs each definition with the names its body calls', () => {
    const scanned = scanFunctions(registry, C_SOURCE, 'c', 'src/util.c');

    expect(scanned.map((fn) => fn.definition.name)).toEqual(['add', 'dup_str']);
    expect([...scanned[0].calls]).toEqual([]);
    expect([...scanned[1].calls]).toEqual(['strdup']);
  });

  it('matches parseFunctions for the definitions themselves', () => {
    const scanned = scanFunctions(registry, JAVA_SOURCE, 'java', 'src/Greeter.java');

    expect(scanned.map((fn) => fn.definition)).toEqual(
      parseFunctions(registry, JAVA_SOURCE, 'java', 'src/Greeter.java'),
    );
    expect([...scanned[0].calls]).toEqual(['format']);
    expect([...scanned[1].calls]).toEqual(['println']);
  });
});

import { asciiExcerpt, hasDisallowedChars, sanitize } from '../../../src/agents/sanitizer';
import { extractCode } from '../../../src/agents/code-extraction';

const DECL = '# -*- coding: utf-8 -*-';

describe('sanitize', () => {
  it('should put exactly one declaration on the first line', () => {
    expect(sanitize('import pygame')).toBe(`${DECL}\nimport pygame`);
    expect(sanitize(`${DECL}\n${DECL}\nimport pygame`)).toBe(`${DECL}\nimport pygame`);
  });

  it('should drop other coding comments', () => {
    expect(sanitize('#!/usr/bin/env python\n# coding: latin-1\nx = 1')).toBe(`${DECL}\n#!/usr/bin/env python\nx = 1`);
  });

  it('should replace non-ASCII and control characters with spaces', () => {
    expect(sanitize('print("Привет")\tx\u0007')).toBe(`${DECL}\nprint("      ")\tx `);
  });

  it('should be idempotent', () => {
    const inputs = [
      '',
      'import pygame',
      `${DECL}\nimport pygame\npygame.init()`,
      `  ${DECL}  \nprint("héllo")\r\n# -*- coding: cp1251 -*-\nx = "→"`,
      '\n\n\nwhile True:\n\tpass\n',
    ];
    for (const input of inputs) {
      const once = sanitize(input);
      expect(sanitize(once)).toBe(once);
      expect(hasDisallowedChars(once)).toBe(false);
      expect(once.split('\n')[0]).toBe(DECL);
    }
  });
});

describe('asciiExcerpt', () => {
  it('should strip non-ASCII, trim and cut to length', () => {
    expect(asciiExcerpt('  ошибка NameError: x  ', 9)).toBe('NameError');
  });
});

describe('extractCode', () => {
  it('should prefer a language-tagged fence', () => {
    const reply = 'Here is the code:\n```\nnot this\n```\n```python\nimport pygame\nprint(1)\n```\nDone.';
    expect(extractCode(reply)).toBe('import pygame\nprint(1)');
  });

  it('should fall back to a bare fence', () => {
    expect(extractCode('```\nx = 1\n```')).toBe('x = 1');
  });

  it('should keep an unterminated fence body', () => {
    expect(extractCode('```python\nx = 1\ny = 2')).toBe('x = 1\ny = 2');
  });

  it('should drop preamble lines without a fence', () => {
    expect(extractCode('Here is your program\nimport pygame\nВот код\nx = 1')).toBe('import pygame\nx = 1');
  });

  it('should return an empty string for an empty fence', () => {
    expect(extractCode('```python\n```')).toBe('');
  });
});

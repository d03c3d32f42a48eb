/**
 * Everything the agents need to know about the kind of program being built:
 * the static checklist markers, the init call the mechanical repair injects,
 * and the skeleton returned when generation fails.
 */
export interface TargetProfile {
  name: string;
  language: string;
  fileExtension: string;
  fenceLanguages: string[];
  encodingDeclaration: string;
  importLine: string;
  initCall: string;
  windowCall: string;
  loopKeyword: string;
  eventPoll: string;
  flushCalls: string[];
  /** Deterministic program returned when the coder cannot reach the model */
  fallbackSource(reason: string): string;
  /**
   * Source that exits with status 0 after `seconds` if nothing failed first,
   * so an endless game loop does not count as a hang.
   */
  withSmokeWindow(source: string, seconds: number): string;
}

function asciiOnly(text: string): string {
  return text.replace(/[^\x20-\x7E]/g, '?');
}

const TRIVIA = /^\s*(#.*)?$/;
const DOCSTRING_OPEN = /^\s*[rRuUbB]?("""|''')/;
const ONE_LINE_STRING = /^\s*[rRuUbB]?("[^"]*"|'[^']*')\s*$/;
const FUTURE_IMPORT = /^\s*from\s+__future__\s+import\b/;

/**
 * Index of the first line after the comments, module docstring and
 * `from __future__` imports that must stay at the top of the file.
 */
export function prologueEnd(lines: string[]): number {
  let i = 0;
  const skipTrivia = (): void => {
    while (i < lines.length && TRIVIA.test(lines[i] ?? '')) i += 1;
  };

  skipTrivia();
  const line = lines[i] ?? '';
  const open = DOCSTRING_OPEN.exec(line);
  if (open) {
    const quote = open[1] ?? '"""';
    if (!line.slice(open[0].length).includes(quote)) {
      i += 1;
      while (i < lines.length && !(lines[i] ?? '').includes(quote)) i += 1;
    }
    i += 1;
    skipTrivia();
  } else if (ONE_LINE_STRING.test(line)) {
    i += 1;
    skipTrivia();
  }

  while (i < lines.length && FUTURE_IMPORT.test(lines[i] ?? '')) {
    i += 1;
    skipTrivia();
  }
  return Math.min(i, lines.length);
}

const PYGAME_DECLARATION = '# -*- coding: utf-8 -*-';

export const pygameProfile: TargetProfile = {
  name: 'pygame',
  language: 'python',
  fileExtension: '.py',
  fenceLanguages: ['python', 'py', 'python3'],
  encodingDeclaration: PYGAME_DECLARATION,
  importLine: 'import pygame',
  initCall: 'pygame.init()',
  windowCall: 'pygame.display.set_mode',
  loopKeyword: 'while',
  eventPoll: 'pygame.event.get()',
  flushCalls: ['pygame.display.flip()', 'pygame.display.update()'],

  fallbackSource(reason: string): string {
    const note = asciiOnly(reason).slice(0, 100);
    return [
      PYGAME_DECLARATION,
      `# Fallback skeleton: generation failed (${note})`,
      'import pygame',
      'import sys',
      '',
      'pygame.init()',
      'screen = pygame.display.set_mode((800, 600))',
      'pygame.display.set_caption("Game")',
      'clock = pygame.time.Clock()',
      '',
      'running = True',
      'while running:',
      '    for event in pygame.event.get():',
      '        if event.type == pygame.QUIT:',
      '            running = False',
      '    screen.fill((0, 0, 0))',
      '    pygame.display.flip()',
      '    clock.tick(60)',
      '',
      'pygame.quit()',
      'sys.exit()',
      '',
    ].join('\n');
  },

  withSmokeWindow(source: string, seconds: number): string {
    const guard = `import threading as _smoke_t, os as _smoke_os; _smoke_w = _smoke_t.Timer(${seconds}, _smoke_os._exit, (0,)); _smoke_w.daemon = True; _smoke_w.start()`;
    const lines = source.split('\n');
    const at = prologueEnd(lines);
    return [...lines.slice(0, at), guard, ...lines.slice(at)].join('\n');
  },
};

export const PROFILES: Record<string, TargetProfile> = {
  pygame: pygameProfile,
};

export function getProfile(name: string): TargetProfile {
  const profile = PROFILES[name];
  if (!profile) {
    throw new Error(`Unknown target profile: ${name}`);
  }
  return profile;
}

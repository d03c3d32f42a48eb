import type { TargetProfile } from './profiles';
import { pygameProfile } from './profiles';

const DISALLOWED = /[^\x20-\x7E\n\t\r]/g;
const CODING_COMMENT = /^\s*#.*coding[:=]\s*[-\w.]+/;

/**
 * Makes generated source safe to hand to the interpreter: printable ASCII
 * only, and exactly one encoding declaration on the first line.
 * sanitize(sanitize(x)) === sanitize(x).
 */
export function sanitize(code: string, profile: TargetProfile = pygameProfile): string {
  const cleaned = code.replace(DISALLOWED, ' ');
  const declaration = profile.encodingDeclaration;
  const body = cleaned.split('\n').filter((line) => line.trim() !== declaration && !CODING_COMMENT.test(line));
  return [declaration, ...body].join('\n');
}

export function hasDisallowedChars(code: string): boolean {
  return /[^\x20-\x7E\n\t\r]/.test(code);
}

/** ASCII-only excerpt used for prompt and retrieval context */
export function asciiExcerpt(text: string, maxChars: number): string {
  return text
    .replace(/[^\x20-\x7E\n]/g, '')
    .trim()
    .slice(0, maxChars);
}

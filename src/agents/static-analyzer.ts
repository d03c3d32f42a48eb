import type { TargetProfile } from './profiles';
import { pygameProfile } from './profiles';
import { hasDisallowedChars } from './sanitizer';
import type { CodeIssue } from './types';

/** Text-only checklist; nothing is executed. */
export class StaticAnalyzer {
  constructor(private profile: TargetProfile = pygameProfile) {}

  analyze(code: string): CodeIssue[] {
    const p = this.profile;
    const issues: CodeIssue[] = [];
    const firstLine = code.split('\n')[0]?.trim() ?? '';

    if (firstLine !== p.encodingDeclaration) {
      issues.push({ type: 'encoding_error', description: `Missing encoding declaration (${p.encodingDeclaration}) on the first line`, severity: 'critical' });
    }
    if (!code.includes(p.importLine)) {
      issues.push({ type: 'missing_import', description: `Missing ${p.importLine}`, severity: 'critical' });
    }
    if (!code.includes(p.initCall)) {
      issues.push({ type: 'missing_init', description: `Missing ${p.initCall}`, severity: 'critical' });
    }
    if (!code.includes(p.loopKeyword) || !code.includes(p.eventPoll)) {
      issues.push({ type: 'missing_game_loop', description: `Missing main loop with ${p.eventPoll}`, severity: 'high' });
    }
    if (!p.flushCalls.some((call) => code.includes(call))) {
      issues.push({ type: 'missing_display_update', description: `Missing display update (${p.flushCalls.join(' or ')})`, severity: 'high' });
    }
    if (hasDisallowedChars(code)) {
      issues.push({ type: 'non_ascii_chars', description: 'Code contains non-ASCII or control characters', severity: 'critical' });
    }

    return issues;
  }
}

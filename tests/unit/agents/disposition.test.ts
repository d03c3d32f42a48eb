import { AutoDispositionProvider, parseDisposition, summarizeIssues } from '../../../src/agents/disposition';
import type { ExecutionOutcome } from '../../../src/agents/types';

describe('parseDisposition', () => {
  it('should map menu keys to dispositions', () => {
    expect(['1', '2', '3', '4'].map(parseDisposition)).toEqual(['auto_fix', 'manual_review', 'skip', 'cancel']);
  });

  it('should accept disposition names regardless of case and padding', () => {
    expect(parseDisposition('  SKIP ')).toBe('skip');
    expect(parseDisposition('manual_review')).toBe('manual_review');
  });

  it('should default to auto_fix for anything else', () => {
    expect(parseDisposition('')).toBe('auto_fix');
    expect(parseDisposition('9')).toBe('auto_fix');
    expect(parseDisposition('whatever')).toBe('auto_fix');
  });
});

describe('AutoDispositionProvider', () => {
  it('should always answer with its configured disposition', async () => {
    await expect(new AutoDispositionProvider().choose()).resolves.toBe('auto_fix');
    await expect(new AutoDispositionProvider('skip').choose()).resolves.toBe('skip');
  });
});

describe('summarizeIssues', () => {
  const failed: ExecutionOutcome = { success: false, exitCode: null, timedOut: true, output: '', durationMs: 30000 };

  it('should list each issue under the execution headline', () => {
    const summary = summarizeIssues([{ type: 'missing_init', description: 'Missing pygame.init()', severity: 'critical' }], failed);

    expect(summary).toBe('Execution failed (timeout)\n- [critical] missing_init: Missing pygame.init()');
  });

  it('should report success without issues', () => {
    expect(summarizeIssues([], { ...failed, success: true, timedOut: false, exitCode: 0 })).toBe('Execution succeeded');
  });
});

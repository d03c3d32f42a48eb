import type { Retriever } from '../retrieval/types';
import type { WorkflowLogger } from '../orchestrator/logger';
import { silentLogger } from '../orchestrator/logger';
import { asciiExcerpt } from './sanitizer';
import type { CodeIssue, IssueSeverity, RuntimeIssueType } from './types';

interface RuntimeRule {
  type: RuntimeIssueType;
  severity: IssueSeverity;
  label: string;
  matches(output: string): boolean;
}

const RAG_CONTEXT_CHARS = 300;

export const RUNTIME_RULES: RuntimeRule[] = [
  {
    type: 'encoding_error',
    severity: 'critical',
    label: 'Encoding problem (source is not valid UTF-8)',
    matches: (out) => out.includes('Non-UTF-8 code') || out.includes('encoding declared'),
  },
  {
    type: 'import_error',
    severity: 'critical',
    label: 'Module import error',
    matches: (out) => out.includes('ImportError') || out.includes('ModuleNotFoundError'),
  },
  {
    type: 'name_error',
    severity: 'high',
    label: 'Undefined name',
    matches: (out) => out.includes('NameError'),
  },
  {
    type: 'syntax_error',
    severity: 'critical',
    label: 'Syntax or indentation error',
    matches: (out) => out.includes('SyntaxError') || out.includes('IndentationError'),
  },
  {
    type: 'attribute_error',
    severity: 'high',
    label: 'Attribute error',
    matches: (out) => out.includes('AttributeError'),
  },
  {
    type: 'black_screen_or_timeout',
    severity: 'high',
    label: 'Black screen or timeout (the program produced no output or never finished)',
    matches: (out) => out.trim() === '' || /timeout|timed out|infinite loop/i.test(out),
  },
];

const EVIDENCE: Record<RuntimeIssueType, RegExp> = {
  encoding_error: /Non-UTF-8|encoding declared/,
  import_error: /ImportError|ModuleNotFoundError/,
  name_error: /NameError/,
  syntax_error: /SyntaxError|IndentationError/,
  attribute_error: /AttributeError/,
  black_screen_or_timeout: /timeout|timed out|infinite loop/i,
};

/** First output line that mentions the rule's marker */
function evidence(output: string, type: RuntimeIssueType): string {
  const line = output.split('\n').find((l) => EVIDENCE[type].test(l));
  return line ? asciiExcerpt(line, 200) : '';
}

/**
 * Maps failed-run output onto the fixed runtime taxonomy and attaches the
 * closest retrieved error pattern to each issue.
 */
export class ErrorAnalyzer {
  constructor(
    private retriever: Retriever,
    private logger: WorkflowLogger = silentLogger,
  ) {}

  classify(output: string): CodeIssue[] {
    return RUNTIME_RULES.filter((rule) => rule.matches(output)).map((rule) => {
      const detail = evidence(output, rule.type);
      return { type: rule.type, severity: rule.severity, description: detail ? `${rule.label}: ${detail}` : rule.label };
    });
  }

  async analyze(output: string): Promise<CodeIssue[]> {
    const issues = this.classify(output);
    for (const issue of issues) {
      issue.ragContext = await this.contextFor(issue.type);
    }
    this.logger.debug('Runtime issues classified', { types: issues.map((i) => i.type) });
    return issues;
  }

  private async contextFor(type: CodeIssue['type']): Promise<string> {
    const hits = await this.retriever.search(type, 'error_patterns', 1);
    const first = hits[0];
    return first ? asciiExcerpt(first.text, RAG_CONTEXT_CHARS) : '';
  }
}

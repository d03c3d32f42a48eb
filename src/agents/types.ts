export type IssueSeverity = 'critical' | 'high';

export type StaticIssueType = 'encoding_error' | 'missing_import' | 'missing_init' | 'missing_game_loop' | 'missing_display_update' | 'non_ascii_chars';

export type RuntimeIssueType = 'encoding_error' | 'import_error' | 'name_error' | 'syntax_error' | 'attribute_error' | 'black_screen_or_timeout';

export type IssueType = StaticIssueType | RuntimeIssueType;

export interface CodeIssue {
  type: IssueType;
  description: string;
  severity: IssueSeverity;
  /** Retrieved error-pattern text for runtime issues; empty when nothing matched */
  ragContext?: string;
}

export interface ExecutionOutcome {
  success: boolean;
  exitCode: number | null;
  timedOut: boolean;
  /** stderr when non-empty, else stdout */
  output: string;
  durationMs: number;
}

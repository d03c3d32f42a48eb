import type { TargetProfile } from '../profiles';
import type { CodeIssue } from '../types';

export const getRepairSystemPrompt = (profile: TargetProfile, task: string, issues: CodeIssue[], solutions: string[]): string => {
  const summary = issues
    .slice(0, 3)
    .map((issue) => `- ${issue.type}: ${issue.description}`)
    .join('\n');

  return `
ACT AS: ${profile.name} error fixing expert
TASK: ${task}

### DETECTED ERRORS
${summary}

### KNOWN SOLUTIONS
${solutions.length ? solutions.join('\n\n') : `Use standard ${profile.name} error fixing patterns.`}

### INSTRUCTIONS
1. Fix ALL detected errors.
2. Keep the working functionality.
3. Return the COMPLETE fixed program; it must run.
4. Use ONLY ASCII characters (English only).
5. The first line must be: ${profile.encodingDeclaration}
6. Return only the code, without explanations.
`.trim();
};

export const getRepairPrompt = (profile: TargetProfile, code: string): string => {
  const fence = profile.fenceLanguages[0] ?? '';
  return `Fix the errors in this program:\n\`\`\`${fence}\n${code}\n\`\`\``;
};

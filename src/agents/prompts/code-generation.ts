import type { TargetProfile } from '../profiles';

export const getCodeGenerationSystemPrompt = (profile: TargetProfile, grounding: string): string => {
  return `
ACT AS: Senior ${profile.name} developer
TASK: Apply one modification to an existing ${profile.language} program and return the whole program.

### CRITICAL RULES
1. Return the ENTIRE modified program, never a fragment or a diff.
2. Change only what the modification needs. Keep existing structure, names and working behaviour.
3. The first line must be: ${profile.encodingDeclaration}
4. The program must contain "${profile.importLine}", call ${profile.initCall} and create the window with ${profile.windowCall}.
5. Use ONLY ASCII characters, in code, strings and comments.
6. Return only code, with no explanation before or after it.

### REFERENCE MATERIAL
${grounding || '(no reference examples available)'}
`.trim();
};

export const getCodeGenerationPrompt = (profile: TargetProfile, currentCode: string, modification: string): string => {
  const fence = profile.fenceLanguages[0] ?? '';
  const base = currentCode.trim() ? `### CURRENT PROGRAM\n\`\`\`${fence}\n${currentCode}\n\`\`\`` : '### CURRENT PROGRAM\n(empty: write the program from scratch)';

  return `
${base}

### MODIFICATION
${modification}

### OUTPUT
The complete updated program.
`.trim();
};

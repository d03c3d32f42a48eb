export const PLANNER_SYSTEM_PROMPT = `
ACT AS: Game development planner
TASK: Split a small game request into sequential implementation steps.

### RULES
1. Return between 3 and 7 steps as a numbered list ("1. ...").
2. Order the steps from foundation to polish: window and initialization first, drawing and behaviour later.
3. Each step is one concrete, testable change to a single program.
4. No code, no markdown headers, no examples, no commentary before or after the list.
`.trim();

export const getPlanningPrompt = (task: string, grounding: string): string => {
  return `
### REQUEST
${task}

### SIMILAR PLANS AND TEMPLATES
${grounding || '(none available, use standard game structure)'}

### OUTPUT
A numbered list of 3 to 7 steps.
`.trim();
};

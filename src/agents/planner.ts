import type { InferenceClient } from '../ollama/types';
import type { Retriever } from '../retrieval/types';
import type { WorkflowLogger } from '../orchestrator/logger';
import { errorMessage, silentLogger } from '../orchestrator/logger';
import { ContextBuilder } from './context-builder';
import { PLANNER_SYSTEM_PROMPT, getPlanningPrompt } from './prompts/planning';

export const MIN_SUBTASKS = 3;
export const MAX_SUBTASKS = 7;

const MIN_LINE_CHARS = 10;
const MIN_SUBTASK_CHARS = 16;
const LINE_PATTERNS = [/^\d+[.)]\s*(.+)$/, /^[-*•]\s*(.+)$/, /^\d+\s+(.+)$/];
const LEAK_MARKERS = ['example', 'пример'];

const GENERIC_PLAN = [
  'Initialize pygame and create the game window',
  'Create the main game object and draw it on screen',
  'Implement keyboard control of the game object',
  'Add the game logic and mechanics',
  'Set up the display of score and interface text',
  'Polish the main loop: frame rate, restart and clean exit',
];

interface Archetype {
  markers: string[];
  plan: string[];
}

const ARCHETYPES: Archetype[] = [
  {
    markers: ['snake', 'змейк'],
    plan: [
      'Initialize pygame and set up the grid playing field',
      'Create the snake as a list of cells that moves every tick',
      'Spawn food at a random free cell of the field',
      'Steer the snake with the arrow keys',
      'Handle collisions: grow on food, end the game on walls or self',
      'Display the score and the game over screen',
    ],
  },
  {
    markers: ['platformer', 'платформер'],
    plan: [
      'Create the window and draw the background',
      'Create the player with velocity and gravity',
      'Create platforms and obstacles',
      'Implement running and jumping controls',
      'Detect collisions between the player and platforms',
      'Add enemies or collectible items',
    ],
  },
];

export interface TaskPlannerOptions {
  model: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Breaks a free-text request into 3 to 7 ordered subtasks.
 * Any inference failure or unusable reply yields a deterministic fallback plan.
 */
export class TaskPlanner {
  constructor(
    private client: InferenceClient,
    private retriever: Retriever,
    private options: TaskPlannerOptions,
    private logger: WorkflowLogger = silentLogger,
  ) {}

  get modelId(): string {
    return this.options.model;
  }

  async decompose(taskDescription: string): Promise<string[]> {
    const similarPlans = await this.retriever.search(taskDescription, 'task_plans', 2);
    const templates = await this.retriever.search(taskDescription, 'code_templates', 1);
    const grounding = ContextBuilder.build([
      { title: 'SIMILAR PLANS', hits: similarPlans, maxChars: 300 },
      { title: 'CODE TEMPLATES', hits: templates, maxChars: 300 },
    ]);

    try {
      const reply = await this.client.generate({
        model: this.options.model,
        system: PLANNER_SYSTEM_PROMPT,
        prompt: getPlanningPrompt(taskDescription, grounding),
        temperature: this.options.temperature ?? 0.1,
        maxTokens: this.options.maxTokens ?? 500,
      });

      const subtasks = parseSubtasks(reply.response);
      if (subtasks.length >= MIN_SUBTASKS) {
        this.logger.info(`Plan created with ${subtasks.length} subtasks`);
        return subtasks;
      }
      this.logger.warn('Plan reply was unusable, using fallback plan', { parsed: subtasks.length });
    } catch (error) {
      this.logger.warn('Planning failed, using fallback plan', { error: errorMessage(error) });
    }

    return fallbackPlan(taskDescription);
  }
}

export function parseSubtasks(reply: string): string[] {
  const subtasks: string[] = [];

  for (const raw of reply.trim().split('\n')) {
    const line = raw.trim();
    if (line.length < MIN_LINE_CHARS) continue;

    for (const pattern of LINE_PATTERNS) {
      const match = pattern.exec(line);
      if (!match) continue;
      const captured = (match[1] ?? '').trim();
      const subtask = stripMarkup(captured);
      const lower = subtask.toLowerCase();
      if (subtask.length >= MIN_SUBTASK_CHARS && !captured.startsWith('```') && !LEAK_MARKERS.some((m) => lower.includes(m))) {
        subtasks.push(subtask);
      }
      break;
    }
  }

  return subtasks.slice(0, MAX_SUBTASKS);
}

/** Drops bold/underline markers, inline code ticks and a dangling colon */
function stripMarkup(text: string): string {
  return text
    .replace(/\*\*|__|`/g, '')
    .trim()
    .replace(/:+$/, '')
    .trim();
}

export function fallbackPlan(taskDescription: string): string[] {
  const lower = taskDescription.toLowerCase();
  const archetype = ARCHETYPES.find((a) => a.markers.some((m) => lower.includes(m)));
  return [...(archetype ? archetype.plan : GENERIC_PLAN)];
}

import fs from 'fs';
import path from 'path';
import type { Config } from './validator';

/** Walks up from this module to the directory holding package.json (works from src/ and dist/src/). */
export function findPackageRoot(start: string = __dirname): string {
  let dir = start;
  while (!fs.existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) return start;
    dir = parent;
  }
  return dir;
}

export const DEFAULT_HOME = '.codesmith';

export const defaults: Config = {
  ollama: {
    base_url: 'http://localhost:11434',
    timeout_ms: 120_000,
    max_retries: 3,
    backoff_base_ms: 1000,
    models: {
      planner: 'phi3:mini',
      coder: 'codellama:7b-instruct',
      fixer: 'qwen2.5:3b-instruct',
      default: 'phi3:mini',
    },
  },
  retrieval: {
    store_path: path.join(DEFAULT_HOME, 'retrieval.json'),
    knowledge_dir: path.join(findPackageRoot(), 'data', 'knowledge'),
    embedding_model: 'nomic-embed-text',
    top_k: 3,
  },
  sandbox: {
    provider: 'local',
    interpreter: 'python3',
    timeout_seconds: 30,
    smoke_seconds: 0,
    env: {
      SDL_VIDEODRIVER: 'dummy',
      SDL_AUDIODRIVER: 'dummy',
      PYGAME_HIDE_SUPPORT_PROMPT: '1',
    },
    e2b_template: 'base',
  },
  storage: {
    states_dir: path.join(DEFAULT_HOME, 'states'),
    output_dir: path.join('output', 'generated'),
  },
  logging: {
    level: 'info',
  },
  profile: 'pygame',
};

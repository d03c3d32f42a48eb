import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { ConfigSchema, ConfigError, Config } from './validator';
import { defaults } from './defaults';

/**
 * DeepPartial allows for recursive partials of the Config type.
 * Used for CLI and test overrides.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[] ? DeepPartial<U>[] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export interface LoadConfigOptions {
  /** Directory searched for codesmith.yaml and .env (default: process.cwd()) */
  cwd?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export const CONFIG_FILE = 'codesmith.yaml';

export function loadConfig(cliOverrides: DeepPartial<Config> = {}, options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  if (!options.env) {
    dotenv.config({ path: path.join(cwd, '.env') });
  }

  // 1. Defaults
  const config: Record<string, unknown> = structuredClone(defaults);

  // 2. codesmith.yaml
  const yamlPath = path.join(cwd, CONFIG_FILE);
  if (fs.existsSync(yamlPath)) {
    const parsedYaml: unknown = YAML.parse(fs.readFileSync(yamlPath, 'utf8'));
    if (isRecord(parsedYaml)) {
      deepMerge(config, parsedYaml);
    }
  }

  // 3. Environment
  const home = env.CODESMITH_HOME;
  deepMerge(config, {
    ollama: {
      base_url: env.OLLAMA_URL,
      models: {
        planner: env.OLLAMA_PLANNER_MODEL,
        coder: env.OLLAMA_CODER_MODEL,
        fixer: env.OLLAMA_FIXER_MODEL,
      },
    },
    retrieval: {
      embedding_model: env.EMBEDDING_MODEL,
      store_path: home ? path.join(home, 'retrieval.json') : undefined,
    },
    sandbox: {
      provider: env.SANDBOX_PROVIDER,
      interpreter: env.PYTHON_BIN,
      e2b_api_key: env.E2B_API_KEY,
    },
    storage: {
      states_dir: home ? path.join(home, 'states') : undefined,
    },
    logging: { level: env.LOG_LEVEL },
  });

  // 4. CLI
  deepMerge(config, cliOverrides);

  // 5. Validate
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed: ${issues.join('; ')}`, issues);
  }

  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

/** Simple deep merge for config objects; undefined leaves are skipped. */
export function deepMerge(target: Record<string, unknown>, source: object): void {
  for (const [key, sourceValue] of Object.entries(source)) {
    if (isRecord(sourceValue)) {
      const existing = target[key];
      const next: Record<string, unknown> = isRecord(existing) ? existing : {};
      target[key] = next;
      deepMerge(next, sourceValue);
    } else if (sourceValue !== undefined) {
      target[key] = sourceValue;
    }
  }
}

/** Copy of the config safe for display: secrets masked. */
export function redactConfig(config: Config): Config {
  const copy = structuredClone(config);
  if (copy.sandbox.e2b_api_key) {
    copy.sandbox.e2b_api_key = `${copy.sandbox.e2b_api_key.slice(0, 4)}****`;
  }
  return copy;
}

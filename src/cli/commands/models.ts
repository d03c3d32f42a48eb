import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import { createOllamaClient } from '../../orchestrator/runtime';
import { CLIWorkflowLogger } from '../cli-logger';
import { formatError, formatInfo, formatSuccess } from '../formatters';
import { isVerbose, reportFailure } from './shared';

export function registerModelsCommand(program: Command): void {
  program
    .command('models')
    .description('Check that the configured models are available on the Ollama server')
    .option('--json', 'Output as JSON', false)
    .action(async (options: { json?: boolean }) => {
      try {
        const config = loadConfig();
        const client = createOllamaClient(config, new CLIWorkflowLogger(isVerbose(program)));
        const roles = Object.entries(config.ollama.models);
        const available = await client.checkModelsAvailable(roles.map(([, model]) => model));

        if (options.json) {
          console.log(JSON.stringify(available, null, 2));
        } else {
          console.log(formatInfo(`server: ${config.ollama.base_url}`));
          for (const [role, model] of roles) {
            const line = `${role.padEnd(8)} ${model}`;
            console.log(available[model] ? formatSuccess(`✓ ${line}`) : formatError(`✗ ${line} (run: ollama pull ${model})`));
          }
        }

        if (roles.some(([, model]) => !available[model])) {
          process.exitCode = 1;
        }
      } catch (err) {
        reportFailure(err);
      }
    });
}

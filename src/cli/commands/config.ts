import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import YAML from 'yaml';
import { promptForConfig } from '../prompts';
import { CONFIG_FILE, loadConfig, redactConfig } from '../../config/loader';
import { defaults } from '../../config/defaults';
import { reportFailure } from './shared';

export function registerConfigCommand(program: Command): void {
  const configCommand = program.command('config').description('Manage configuration');

  configCommand
    .command('init')
    .description(`Write ${CONFIG_FILE} interactively`)
    .action(async () => {
      try {
        console.log(chalk.blue('Initializing configuration...'));
        const answers = await promptForConfig({ ollamaUrl: defaults.ollama.base_url, coderModel: defaults.ollama.models.coder });

        const content = {
          ollama: {
            base_url: answers.ollamaUrl ?? defaults.ollama.base_url,
            models: { coder: answers.coderModel ?? defaults.ollama.models.coder },
          },
          sandbox: { provider: answers.sandboxProvider === 'e2b' ? 'e2b' : 'local' },
        };

        const targetPath = path.join(process.cwd(), CONFIG_FILE);
        if (fs.existsSync(targetPath)) {
          console.log(chalk.yellow(`${CONFIG_FILE} already exists. Overwriting...`));
        }
        fs.writeFileSync(targetPath, YAML.stringify(content));
        console.log(chalk.green(`Configuration saved to ${targetPath}`));

        if (answers.e2bApiKey) {
          fs.appendFileSync(path.join(process.cwd(), '.env'), `E2B_API_KEY=${answers.e2bApiKey}\n`);
          console.log(chalk.green('E2B API key appended to .env'));
        }
      } catch (err) {
        reportFailure(err);
      }
    });

  configCommand
    .command('validate')
    .description('Validate current configuration')
    .action(() => {
      try {
        const config = loadConfig();
        console.log(chalk.green('✓ Configuration is valid.'));
        if (config.sandbox.provider === 'e2b' && !config.sandbox.e2b_api_key) {
          console.log(chalk.yellow('! sandbox.provider is e2b but no E2B_API_KEY is set'));
          process.exitCode = 1;
        }
        if (!fs.existsSync(config.retrieval.knowledge_dir)) {
          console.log(chalk.yellow(`! knowledge directory not found: ${config.retrieval.knowledge_dir}`));
        }
      } catch (err) {
        console.error(chalk.red('✗ Configuration is invalid:'));
        reportFailure(err);
      }
    });

  configCommand
    .command('show')
    .description('Show current configuration')
    .option('--yaml', 'Output as YAML', false)
    .action((options: { yaml?: boolean }) => {
      try {
        const masked = redactConfig(loadConfig());
        console.log(options.yaml ? YAML.stringify(masked) : JSON.stringify(masked, null, 2));
      } catch (err) {
        reportFailure(err);
      }
    });
}

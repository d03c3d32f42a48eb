import inquirer from 'inquirer';
import type { Disposition, DispositionProvider, DispositionRequest } from '../agents/disposition';
import { DISPOSITION_MENU, parseDisposition } from '../agents/disposition';
import { formatIssues, formatStep, formatVerboseSection, formatWarning } from './formatters';

interface DispositionAnswers {
  disposition?: string;
}

interface TaskAnswers {
  task?: string;
}

interface ConfigAnswers {
  ollamaUrl?: string;
  coderModel?: string;
  sandboxProvider?: string;
  e2bApiKey?: string;
}

/** Asks the operator at the terminal how to proceed with a failing program */
export class InquirerDispositionProvider implements DispositionProvider {
  async choose(request: DispositionRequest): Promise<Disposition> {
    console.log('');
    console.log(formatStep('Validation found problems'));
    console.log(formatIssues(request.issues));
    if (!request.execution.success && request.execution.output.trim()) {
      console.log(formatWarning(request.execution.output.trim().split('\n').slice(-5).join('\n  ')));
    }

    const answers = (await inquirer.prompt([
      {
        type: 'list',
        name: 'disposition',
        message: 'How should this be handled?',
        choices: DISPOSITION_MENU.map((item) => ({ name: `${item.key}. ${item.label}`, value: item.disposition })),
        default: 'auto_fix',
      },
    ])) as DispositionAnswers;

    const disposition = parseDisposition(answers.disposition ?? '');
    if (disposition === 'manual_review') {
      console.log(formatVerboseSection('Code for review', request.code));
    }
    return disposition;
  }
}

export const promptForTask = async (): Promise<string> => {
  const answers = (await inquirer.prompt([
    {
      type: 'input',
      name: 'task',
      message: 'Describe the program to build:',
      validate: (input: string) => input.trim().length > 0 || 'A description is required',
    },
  ])) as TaskAnswers;

  return (answers.task ?? '').trim();
};

export const promptForConfig = async (defaults: { ollamaUrl: string; coderModel: string }): Promise<ConfigAnswers> => {
  return (await inquirer.prompt([
    {
      type: 'input',
      name: 'ollamaUrl',
      message: 'Ollama server URL:',
      default: defaults.ollamaUrl,
    },
    {
      type: 'input',
      name: 'coderModel',
      message: 'Model for code generation:',
      default: defaults.coderModel,
    },
    {
      type: 'list',
      name: 'sandboxProvider',
      message: 'Where should generated programs run?',
      choices: ['local', 'e2b'],
      default: 'local',
    },
    {
      type: 'input',
      name: 'e2bApiKey',
      message: 'E2B API key:',
      when: (answers: ConfigAnswers) => answers.sandboxProvider === 'e2b',
      validate: (input: string) => input.length > 0 || 'E2B API key is required',
    },
  ])) as ConfigAnswers;
};

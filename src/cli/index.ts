#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { findPackageRoot } from '../config/defaults';
import { registerCommands } from './commands';
import { reportFailure } from './commands/shared';

function readVersion(): string {
  const pkg: unknown = JSON.parse(fs.readFileSync(path.join(findPackageRoot(), 'package.json'), 'utf8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('codesmith')
  .description('Turn a natural-language request into a validated pygame program using local models')
  .version(readVersion())
  .option('--verbose', 'Show detailed output', false);

registerCommands(program);

program.parseAsync(process.argv).catch(reportFailure);

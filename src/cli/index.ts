import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createDetectCommand } from './commands/detect.js';
import { createResolveCommand } from './commands/resolve.js';
import { createTargetsCommand } from './commands/targets.js';
import { createAnalyzeCommand } from './commands/analyze.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('binpick')
    .description('Pick the right GitHub release asset for a platform and architecture')
    .version(readVersion());
  [createDetectCommand, createResolveCommand, createTargetsCommand, createAnalyzeCommand].forEach((cmd) =>
    program.addCommand(cmd())
  );
  return program;
}

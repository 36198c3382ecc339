#!/usr/bin/env node

// Точка входа CLI для локальных эмбеддингов.
import { Command } from 'commander';
import { modelsCommand } from './commands/models-cmd.js';
import { warmupCommand } from './commands/warmup-cmd.js';
import { embedCommand } from './commands/embed-cmd.js';

const program = new Command()
  .name('local-embed')
  .description('Local text embeddings with ONNX models')
  .version('0.1.0');

program.addCommand(modelsCommand);
program.addCommand(warmupCommand);
program.addCommand(embedCommand);

await program.parseAsync();

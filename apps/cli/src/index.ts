#!/usr/bin/env node

import { Command } from 'commander';
import { openDatabase } from './helpers.js';
import { createTasksCommand } from './commands/tasks.js';
import { createTaskCommand } from './commands/task.js';
import { createAreasCommand } from './commands/areas.js';
import { createTagsCommand } from './commands/tags.js';
import { createChecklistCommand } from './commands/checklist.js';
import { createVersionCommand, createTokenCommand } from './commands/meta.js';

// Build the CLI program
const program = new Command()
  .name('thingsql')
  .description('Read tasks, areas and tags from the Things database')
  .version('1.0.0')
  .option('-d, --database <path>', 'Database file (default: $THINGSDB, then the app\'s own)')
  .option('--print-sql', 'Log every SQL statement before it runs')
  .option('--json', 'Print records as JSON');

// Register commands
program.addCommand(createTasksCommand(openDatabase));
program.addCommand(createTaskCommand(openDatabase));
program.addCommand(createAreasCommand(openDatabase));
program.addCommand(createTagsCommand(openDatabase));
program.addCommand(createChecklistCommand(openDatabase));
program.addCommand(createVersionCommand(openDatabase));
program.addCommand(createTokenCommand(openDatabase));

program.parse();

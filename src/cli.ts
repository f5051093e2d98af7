#!/usr/bin/env node

import { createApp } from './app';
import { loadConfig } from './main/config';
import { createProgram } from './main/commands';

const config = loadConfig();

const program = createProgram({
  createApp: () => createApp(config),
  print: (line) => console.log(line),
  printError: (line) => console.error(line),
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exitCode = 1;
});

import { Command } from 'commander';
import type { CommandContext } from './context';
import { registerVerbCommands } from './verb.commands';
import { registerPronunciationCommands } from './pronunciation.commands';
import { registerPreferencesCommands } from './preferences.commands';

export type { CommandContext } from './context';

export function createProgram(ctx: CommandContext): Command {
  const program = new Command();

  program
    .name('irregular-verbs')
    .description('English irregular verbs: forms, meanings and pronunciation')
    .version('1.0.0');

  registerVerbCommands(program, ctx);
  registerPronunciationCommands(program, ctx);
  registerPreferencesCommands(program, ctx);

  return program;
}

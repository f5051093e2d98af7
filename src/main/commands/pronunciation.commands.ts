import type { Command } from 'commander';
import type { CommandContext } from './context';
import { reportFailure, withApp } from './context';

export function registerPronunciationCommands(program: Command, ctx: CommandContext): void {
  program
    .command('say')
    .description('pronounce a verb form through the configured TTS server')
    .argument('<id>', 'verb id')
    .argument('[tense]', 'base, past or participle', 'base')
    .option('-d, --dialect <code>', 'en-US or en-UK (defaults to the saved preference)')
    .action((id: string, tense: string, options: { dialect?: string }) => withApp(ctx, async (app) => {
      const initialized = await app.verbs.initializeStore();
      if (!initialized.success) return reportFailure(ctx, initialized.error);

      const dialect = options.dialect ?? (await app.preferences.get()).dialect;
      const result = await app.pronunciation.speak(id, tense, dialect);
      if (!result.success) return reportFailure(ctx, result.error);
      ctx.print(`Speaking "${result.data}" (${dialect})`);
    }));
}

import type { Command } from 'commander';
import type { CommandContext } from './context';
import { reportFailure, withApp } from './context';
import { formatVerbDetail, formatVerbLine } from './format';

export function registerVerbCommands(program: Command, ctx: CommandContext): void {
  program
    .command('search')
    .description('search verbs by any form, definition word or usage context')
    .argument('<query>', 'text to search for')
    .action((query: string) => withApp(ctx, async (app) => {
      const initialized = await app.verbs.initializeStore();
      if (!initialized.success) return reportFailure(ctx, initialized.error);

      const { dialect } = await app.preferences.get();
      const result = await app.verbs.search(query);
      if (!result.success) return reportFailure(ctx, result.error);

      if (result.data.length === 0) {
        ctx.print(`No verbs match "${query}"`);
        return;
      }
      for (const verb of result.data) {
        ctx.print(formatVerbLine(verb, dialect));
      }
    }));

  program
    .command('show')
    .description('show forms, meanings and examples of a verb')
    .argument('<id>', 'verb id')
    .action((id: string) => withApp(ctx, async (app) => {
      const initialized = await app.verbs.initializeStore();
      if (!initialized.success) return reportFailure(ctx, initialized.error);

      const { dialect } = await app.preferences.get();
      const result = await app.verbs.getById(id);
      if (!result.success) return reportFailure(ctx, result.error);

      if (!result.data) {
        ctx.printError(`Verb not found: ${id}`);
        process.exitCode = 1;
        return;
      }
      for (const line of formatVerbDetail(result.data, dialect)) {
        ctx.print(line);
      }
    }));

  program
    .command('count')
    .description('number of verbs in the store')
    .action(() => withApp(ctx, async (app) => {
      const initialized = await app.verbs.initializeStore();
      if (!initialized.success) return reportFailure(ctx, initialized.error);

      const result = await app.verbs.getCount();
      if (!result.success) return reportFailure(ctx, result.error);
      ctx.print(String(result.data));
    }));
}

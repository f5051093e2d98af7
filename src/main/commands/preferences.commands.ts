import type { Command } from 'commander';
import type { CommandContext } from './context';
import { reportFailure, withApp } from './context';
import { formatPreferences } from './format';
import type { Result, UserPreferences } from '../../shared/types';

export function registerPreferencesCommands(program: Command, ctx: CommandContext): void {
  const printResult = (result: Result<UserPreferences>) => {
    if (!result.success) return reportFailure(ctx, result.error);
    for (const line of formatPreferences(result.data)) {
      ctx.print(line);
    }
  };

  const prefs = program
    .command('prefs')
    .description('show or change user preferences')
    .action(() => withApp(ctx, async (app) => {
      for (const line of formatPreferences(await app.preferences.get())) {
        ctx.print(line);
      }
    }));

  prefs
    .command('set-dialect')
    .argument('<code>', 'en-US or en-UK')
    .action((code: string) => withApp(ctx, async (app) => {
      printResult(await app.preferences.setDialect(code));
    }));

  prefs
    .command('dark-mode')
    .argument('<state>', 'on or off')
    .action((state: string) => withApp(ctx, async (app) => {
      if (state !== 'on' && state !== 'off') {
        ctx.printError(`Expected "on" or "off", got "${state}"`);
        process.exitCode = 1;
        return;
      }
      printResult(await app.preferences.setDarkMode(state === 'on'));
    }));

  prefs
    .command('reset')
    .description('restore defaults (premium status is kept)')
    .action(() => withApp(ctx, async (app) => {
      printResult(await app.preferences.reset());
    }));
}

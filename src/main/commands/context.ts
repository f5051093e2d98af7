import type { App } from '../../app';
import type { FailureLike } from '../../shared/types';
import { formatFailure } from './format';

export interface CommandContext {
  createApp: () => App;
  print: (line: string) => void;
  printError: (line: string) => void;
}

/**
 * Run a command body against a fresh App and always close it.
 */
export async function withApp(ctx: CommandContext, body: (app: App) => Promise<void>): Promise<void> {
  const app = ctx.createApp();
  try {
    await body(app);
  } finally {
    await app.close();
  }
}

export function reportFailure(ctx: CommandContext, failure: FailureLike): void {
  ctx.printError(formatFailure(failure));
  process.exitCode = 1;
}

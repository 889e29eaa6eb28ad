/**
 * Process startup
 *
 * The CLI module is loaded lazily so that a failing environment check,
 * which throws while the config modules load, is logged like any other
 * fatal error.
 */

import pino from 'pino';
import type { Logger } from 'pino';

export interface CliModule {
  run(args: readonly string[]): Promise<number>;
}

export function createFatalLogger(): Logger {
  return pino({ base: { service: 'corpus-split' } });
}

/**
 * Run the CLI and resolve to the process exit code
 */
export async function bootstrap(
  args: readonly string[],
  loadCli: () => Promise<CliModule> = () => import('./cli.js'),
  fatalLogger: () => Logger = createFatalLogger
): Promise<number> {
  try {
    const cli = await loadCli();
    return await cli.run(args);
  } catch (error) {
    fatalLogger().fatal({ error }, 'Application failed');
    return 1;
  }
}

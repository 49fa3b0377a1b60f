import { Logger } from '@pdf-outline/logger';
import chalk from 'chalk';

/**
 * Console-backed logger; debug output only with `verbose`
 */
export function createConsoleLogger(verbose: boolean): Logger {
  return Logger.withMinLevel(
    {
      debug: (...args) => console.debug(chalk.dim(...args)),
      info: (...args) => console.info(...args),
      warn: (...args) => console.warn(chalk.yellow(...args)),
      error: (...args) => console.error(chalk.red(...args)),
    },
    verbose ? 'debug' : 'info',
  );
}

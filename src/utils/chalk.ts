/**
 * Chalk configuration with auto-detection for stdio mode and non-TTY environments
 */

import chalk, { Chalk } from 'chalk';

// Detect scenarios where colors should be disabled
export function shouldDisableColors(env: NodeJS.ProcessEnv = process.env, isTTY: boolean = Boolean(process.stdout.isTTY)): boolean {
  // stdio mode and piped output are not terminals
  if (!isTTY) {
    return true;
  }

  if (env.NO_COLOR) {
    return true;
  }

  if (env.FORCE_COLOR === '0' || env.FORCE_COLOR === 'false') {
    return true;
  }

  // CI environments, unless colour is forced
  if (env.CI && !env.FORCE_COLOR) {
    return true;
  }

  return false;
}

// Configure chalk instance based on environment
const configuredChalk = new Chalk({
  level: shouldDisableColors() ? 0 : chalk.level
});

export default configuredChalk;

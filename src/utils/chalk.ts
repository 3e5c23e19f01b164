/**
 * Chalk instance with colour auto-detection for piped and CI output
 */

import { Chalk } from 'chalk';

function shouldDisableColors(): boolean {
  if (!process.stdout.isTTY) {
    return true;
  }

  if (process.env.NO_COLOR) {
    return true;
  }

  if (process.env.FORCE_COLOR === '0' || process.env.FORCE_COLOR === 'false') {
    return true;
  }

  if (process.env.CI && !process.env.FORCE_COLOR) {
    return true;
  }

  return false;
}

const configuredChalk = shouldDisableColors() ? new Chalk({ level: 0 }) : new Chalk();

export default configuredChalk;

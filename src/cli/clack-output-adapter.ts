/**
 * Clack Output Adapter
 *
 * OutputPort for interactive terminals, rendered with @clack/prompts.
 */

import { cancel, confirm as clackConfirm, isCancel, log, note as clackNote, spinner as clackSpinner } from '@clack/prompts';
import type { OutputPort, UnifiedSpinner } from '../core/ports/output.js';
import { consoleOutput } from '../core/ports/console-output.js';
import { UserCancellationError } from '../utils/errors.js';

export function createClackOutput(): OutputPort {
  return {
    info(message: string): void {
      log.info(message);
    },

    step(message: string): void {
      log.step(message);
    },

    success(message: string): void {
      log.success(message);
    },

    error(message: string): void {
      log.error(message);
    },

    warn(message: string): void {
      log.warn(message);
    },

    note(content: string, title?: string): void {
      clackNote(content, title ?? '');
    },

    async confirm(message: string, options?: { initial?: boolean }): Promise<boolean> {
      const result = await clackConfirm({
        message,
        initialValue: options?.initial ?? false
      });
      if (isCancel(result)) {
        cancel('Operation cancelled.');
        throw new UserCancellationError();
      }
      return result;
    },

    spinner(): UnifiedSpinner {
      const s = clackSpinner();
      let isStarted = false;

      return {
        start(message: string) {
          if (!isStarted) {
            s.start(message);
            isStarted = true;
          }
        },
        stop(finalMessage?: string) {
          if (isStarted) {
            s.stop(finalMessage);
            isStarted = false;
          }
        },
        message(text: string) {
          if (isStarted) {
            s.message(text);
          }
        }
      };
    }
  };
}

/**
 * Plain output for CI and piped sessions.
 */
export function createPlainOutput(): OutputPort {
  return consoleOutput;
}

/**
 * Output Port
 *
 * Everything user-facing goes through this interface so core code never
 * writes to the terminal itself.
 *
 * Implementations:
 *   - createClackOutput (CLI, TTY): @clack/prompts
 *   - createPlainOutput / consoleOutput (CI, pipes, tests): console.log
 */

export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
  message(text: string): void;
}

export interface OutputPort {
  info(message: string): void;

  step(message: string): void;

  success(message: string): void;

  error(message: string): void;

  warn(message: string): void;

  /** A boxed block of related lines with an optional title */
  note(content: string, title?: string): void;

  /** Ask yes/no; non-interactive ports answer with `initial` */
  confirm(message: string, options?: { initial?: boolean }): Promise<boolean>;

  spinner(): UnifiedSpinner;
}

import type { OutputPort } from './output.js';
import { consoleOutput } from './console-output.js';

export type { OutputPort, UnifiedSpinner } from './output.js';
export { consoleOutput };

/** The given port, or plain console output */
export function resolveOutput(ctx?: { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}

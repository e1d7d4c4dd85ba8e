import type { CommandResult, InstallSummary } from '../../types/index.js';
import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/index.js';
import { formatCount, getTreeConnector } from '../../utils/formatters.js';

function renderTreeList(items: string[], output: OutputPort, indent: string = '  '): void {
  items.forEach((item, index) => {
    output.info(`${indent}${getTreeConnector(index === items.length - 1)}${item}`);
  });
}

/**
 * Print the outcome of one install call. Partial progress is shown even
 * when the install failed part way.
 */
export function displayInstallationResults(
  target: string,
  result: CommandResult<InstallSummary>,
  output: OutputPort = resolveOutput()
): void {
  const summary = result.data ?? { installed: [], updated: [], skipped: [] };
  const changed = summary.installed.length + summary.updated.length;

  if (!result.success) {
    output.error(`Failed to install ${target}: ${result.error ?? 'unknown error'}`);
    if (changed > 0) {
      output.info(`Completed before the failure: ${formatCount(changed, 'mod')}`);
      renderTreeList([...summary.installed, ...summary.updated], output);
    }
    return;
  }

  if (changed === 0) {
    output.success(`${target} is already up to date`);
    return;
  }

  output.success(`Installed ${target}`);
  if (summary.installed.length > 0) {
    output.info(`Installed: ${formatCount(summary.installed.length, 'mod')}`);
    renderTreeList(summary.installed, output);
  }
  if (summary.updated.length > 0) {
    output.info(`Updated: ${formatCount(summary.updated.length, 'mod')}`);
    renderTreeList(summary.updated, output);
  }
  if (summary.skipped.length > 0) {
    output.info(`Already current: ${summary.skipped.join(', ')}`);
  }
}

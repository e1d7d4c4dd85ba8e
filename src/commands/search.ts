import { Command } from 'commander';
import pc from 'picocolors';

import { REGISTRY } from '../constants/index.js';
import { createCliContext, getGlobalOptions } from '../cli/context.js';
import { ValidationError, withErrorHandling } from '../utils/errors.js';
import { getTreeConnector } from '../utils/formatters.js';

interface SearchCommandOptions {
  limit?: string;
}

function parseLimit(value: string | undefined): number {
  if (value === undefined) {
    return REGISTRY.DEFAULT_SEARCH_LIMIT;
  }
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1 || limit > 100) {
    throw new ValidationError(`--limit must be an integer between 1 and 100, got '${value}'`);
  }
  return limit;
}

export function setupSearchCommand(program: Command): void {
  program
    .command('search')
    .argument('<query>', 'search text')
    .description('Search the registry for mods compatible with this server')
    .option('-l, --limit <n>', `maximum number of results (default ${REGISTRY.DEFAULT_SEARCH_LIMIT})`)
    .action(withErrorHandling(async (query: string, options: SearchCommandOptions, command: Command) => {
      const limit = parseLimit(options.limit);
      const { app, output } = await createCliContext(getGlobalOptions(command));
      const { gameVersion, loader } = app.environment;

      const hits = await app.registry.searchProjects(query, {
        limit,
        gameVersions: [gameVersion],
        loaders: [loader]
      });

      if (hits.length === 0) {
        output.info(`No mods matching '${query}' for ${gameVersion}/${loader}.`);
        return;
      }

      output.step(`Results for '${query}' (${gameVersion}/${loader})`);
      hits.forEach((hit, index) => {
        const installed = app.ledger.has(hit.slug) ? pc.green(' [installed]') : '';
        output.info(`${getTreeConnector(index === hits.length - 1)}${pc.bold(hit.slug)}${installed} ${pc.dim(hit.title)}`);
        if (hit.description) {
          output.info(`    ${pc.dim(hit.description)}`);
        }
      });
    }));
}

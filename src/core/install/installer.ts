import { basename, join } from 'path';

import type {
  CommandResult,
  InstalledMod,
  InstallOptions,
  InstallSummary,
  PackageRegistry,
  ServerEnvironment,
  ServerSummary
} from '../../types/index.js';
import { describeError, DownloadError, handleError, NoCompatibleVersionError, ValidationError } from '../../utils/errors.js';
import { exists, remove } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { filterCompatibleVersions } from '../compatibility.js';
import type { DependencyResolver, ResolutionNode } from '../dependency-resolver/index.js';
import type { LedgerStore, LedgerTransaction } from '../ledger/index.js';
import { extractSlug } from '../registry/project-url.js';

export interface InstallerOptions {
  registry: PackageRegistry;
  resolver: DependencyResolver;
  ledger: LedgerStore;
  environment: ServerEnvironment;
  serverPath: string;
  modsDir: string;
  autoUpdateEnabled: boolean;
  registryHost?: string;
  preferStable?: boolean;
  now?: () => Date;
}

/**
 * Result of checking one installed mod against the registry.
 */
export type UpdateOutcome =
  | { kind: 'updated'; from: string; to: string }
  | { kind: 'current'; version: string }
  | { kind: 'no-compatible'; version: string }
  | { kind: 'not-installed' }
  | { kind: 'failed'; version: string; error: string };

/**
 * Materializes resolution plans into the server's mods directory and keeps
 * the ledger in step with it.
 *
 * Every public mutation runs as one ledger transaction, which excludes other
 * mutations in this process and in any other process sharing the server
 * directory. `update` reuses the install path inside its own transaction.
 */
export class Installer {
  private readonly registry: PackageRegistry;
  private readonly resolver: DependencyResolver;
  private readonly ledger: LedgerStore;
  private readonly environment: ServerEnvironment;
  private readonly serverPath: string;
  private readonly modsDir: string;
  private readonly autoUpdateEnabled: boolean;
  private readonly registryHost: string | undefined;
  private readonly preferStable: boolean;
  private readonly now: () => Date;

  constructor(options: InstallerOptions) {
    this.registry = options.registry;
    this.resolver = options.resolver;
    this.ledger = options.ledger;
    this.environment = options.environment;
    this.serverPath = options.serverPath;
    this.modsDir = options.modsDir;
    this.autoUpdateEnabled = options.autoUpdateEnabled;
    this.registryHost = options.registryHost;
    this.preferStable = options.preferStable ?? true;
    this.now = options.now ?? (() => new Date());
  }

  install(slugOrUrl: string, options: InstallOptions = {}): Promise<CommandResult<InstallSummary>> {
    return this.ledger.transaction(ledger => this.installInTransaction(ledger, slugOrUrl, options));
  }

  /** True when a newer compatible version was installed */
  async update(slug: string): Promise<boolean> {
    const outcome = await this.checkAndUpdate(slug);
    return outcome.kind === 'updated';
  }

  /**
   * Bring one installed mod to its best compatible version. Registry errors
   * while looking up versions propagate.
   */
  checkAndUpdate(slug: string): Promise<UpdateOutcome> {
    return this.ledger.transaction(ledger => this.updateInTransaction(ledger, slug));
  }

  /** Delete the mod's file and ledger entry. False when it is not installed. */
  remove(slug: string): Promise<boolean> {
    return this.ledger.transaction(async ledger => {
      const existing = ledger.get(slug);
      if (!existing) {
        return false;
      }
      await remove(this.artifactPath(existing.fileName));
      await ledger.remove(slug);
      logger.info(`Removed ${slug}@${existing.version}`);
      return true;
    });
  }

  setAutoUpdate(slug: string, enabled: boolean): Promise<boolean> {
    return this.ledger.update(slug, { autoUpdate: enabled });
  }

  /** Reload the ledger so the read methods see other processes' changes */
  refresh(): Promise<void> {
    return this.ledger.refresh();
  }

  listInstalled(): InstalledMod[] {
    return this.ledger.list();
  }

  getSummary(): ServerSummary {
    return {
      gameVersion: this.environment.gameVersion,
      loader: this.environment.loader,
      serverPath: this.serverPath,
      modCount: this.ledger.size,
      autoUpdateEnabled: this.autoUpdateEnabled,
      lastUpdateCheck: this.ledger.getMetadata().lastUpdateCheck
    };
  }

  private async installInTransaction(
    ledger: LedgerTransaction,
    slugOrUrl: string,
    options: InstallOptions
  ): Promise<CommandResult<InstallSummary>> {
    const summary: InstallSummary = { installed: [], updated: [], skipped: [] };
    const { gameVersion, loader } = this.environment;

    try {
      const rootSlug = extractSlug(slugOrUrl, this.registryHost);
      const plan = await this.resolver.resolve(rootSlug, gameVersion, loader);
      if (plan.length === 0) {
        throw new NoCompatibleVersionError(rootSlug, gameVersion, loader);
      }

      const planSlugs = plan.map(node => node.project.slug);
      for (const node of plan) {
        const dependencies = planSlugs.filter(slug => slug !== node.project.slug);
        await this.installNode(ledger, node, dependencies, options, summary);
      }

      logger.info(
        `Install of '${rootSlug}' finished: ${summary.installed.length} installed, ` +
        `${summary.updated.length} updated, ${summary.skipped.length} skipped`
      );
      return { success: true, data: summary };
    } catch (error) {
      logger.error(`Install of '${slugOrUrl}' failed: ${describeError(error)}`);
      return { ...handleError(error), data: summary };
    }
  }

  private async installNode(
    ledger: LedgerTransaction,
    node: ResolutionNode,
    dependencies: string[],
    options: InstallOptions,
    summary: InstallSummary
  ): Promise<void> {
    const slug = node.project.slug;
    const version = node.version.versionNumber;

    if (!node.file) {
      logger.warn(`Version ${version} of '${slug}' has no downloadable file; skipping`);
      return;
    }

    const existing = ledger.get(slug);
    const installed = existing ? await this.isOnDisk(existing) : false;

    if (existing && installed && existing.version === version && !options.forceUpdate) {
      logger.debug(`${slug}@${version} already installed`);
      summary.skipped.push(slug);
      return;
    }

    const fileName = safeFileName(node.file.filename);
    const target = this.artifactPath(fileName);
    const ok = await this.registry.download(node.file, target);
    if (!ok) {
      throw new DownloadError(fileName, { slug, url: node.file.url });
    }

    // The replaced artifact goes only after its successor is in place
    if (existing && existing.fileName !== fileName) {
      await remove(this.artifactPath(existing.fileName));
    }

    await ledger.add({
      slug,
      name: node.project.title,
      version,
      fileName,
      installedAt: this.now().toISOString(),
      autoUpdate: options.autoUpdate ?? existing?.autoUpdate ?? true,
      dependencies,
      gameVersions: [...node.version.gameVersions],
      loader: this.environment.loader,
      projectId: node.project.id,
      versionId: node.version.id,
      fileSize: node.file.size
    });

    if (existing && installed) {
      logger.info(`Updated ${slug} ${existing.version} -> ${version}`);
      summary.updated.push(slug);
    } else {
      logger.info(`Installed ${slug}@${version}`);
      summary.installed.push(slug);
    }
  }

  private async updateInTransaction(ledger: LedgerTransaction, slug: string): Promise<UpdateOutcome> {
    const existing = ledger.get(slug);
    if (!existing) {
      return { kind: 'not-installed' };
    }

    const { gameVersion, loader } = this.environment;
    const versions = await this.registry.getVersions(slug, { gameVersions: [gameVersion], loaders: [loader] });
    const best = filterCompatibleVersions(versions, gameVersion, loader, { preferStable: this.preferStable })[0];
    if (!best) {
      return { kind: 'no-compatible', version: existing.version };
    }
    if (best.versionNumber === existing.version) {
      return { kind: 'current', version: existing.version };
    }

    const result = await this.installInTransaction(ledger, slug, { forceUpdate: true, autoUpdate: existing.autoUpdate });
    if (!result.success) {
      return { kind: 'failed', version: existing.version, error: result.error ?? 'install failed' };
    }
    return { kind: 'updated', from: existing.version, to: best.versionNumber };
  }

  private artifactPath(fileName: string): string {
    return join(this.modsDir, fileName);
  }

  private isOnDisk(mod: InstalledMod): Promise<boolean> {
    return exists(this.artifactPath(mod.fileName));
  }
}

/**
 * Registry-supplied file names must name a file directly inside the mods
 * directory.
 */
export function safeFileName(name: string): string {
  const candidate = name.trim();
  if (
    candidate.length === 0 ||
    candidate === '.' ||
    candidate === '..' ||
    candidate.includes('\\') ||
    basename(candidate) !== candidate
  ) {
    throw new ValidationError(`unsafe file name from registry: '${name}'`, { fileName: name });
  }
  return candidate;
}

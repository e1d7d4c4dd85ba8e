import type { ModLoader } from './index.js';

export interface InstalledMod {
  slug: string;
  /** Display name (the project's title) */
  name: string;
  /** Installed version number as reported by the registry */
  version: string;
  fileName: string;
  installedAt: string;
  autoUpdate: boolean;
  /** Slugs installed together with this mod, self excluded */
  dependencies: string[];
  gameVersions: string[];
  loader: ModLoader;
  projectId: string;
  versionId: string;
  fileSize: number;
}

export interface LedgerMetadata {
  createdAt: string;
  updatedAt: string | null;
  lastUpdateCheck: string | null;
}

export interface LedgerData {
  mods: Map<string, InstalledMod>;
  metadata: LedgerMetadata;
}

export type InstalledModPatch = Partial<Omit<InstalledMod, 'slug'>>;

import { existsSync } from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';

export type DiscoveryOptions = {
  markerDir?: string;
};

// Scenario whose presence marks a directory as testable.
const MARKER_SCENARIO = 'default';

/**
 * Find testable units under `rootDir`.
 *
 * A unit is `category/name` when `category/name/<markerDir>/default` exists,
 * otherwise `category/name/sub` for each sub directory that carries the marker.
 * Hidden categories are ignored. The result is sorted and free of duplicates.
 */
export function discoverUnits(rootDir: string, options: DiscoveryOptions = {}): string[] {
  if (!existsSync(rootDir)) {
    return [];
  }
  const marker = `${fg.escapePath(options.markerDir ?? 'molecule')}/${MARKER_SCENARIO}`;
  const globOptions = { cwd: rootDir, dot: true, onlyFiles: false } as const;

  const unitDirs = new Set(
    fg.sync(`*/*/${marker}`, globOptions).map((p) => p.split('/').slice(0, 2).join('/'))
  );
  const subunitDirs = fg
    .sync(`*/*/*/${marker}`, globOptions)
    .map((p) => p.split('/').slice(0, 3).join('/'))
    .filter((id) => !unitDirs.has(id.split('/').slice(0, 2).join('/')));

  const units = new Set<string>();
  for (const id of [...unitDirs, ...subunitDirs]) {
    const category = id.split('/')[0] ?? '';
    if (category.startsWith('.')) {
      continue;
    }
    units.add(id);
  }
  return [...units].sort();
}

/** Absolute directory of a unit inside the units root. */
export function unitPath(rootDir: string, unit: string): string {
  return path.join(rootDir, ...unit.split('/'));
}

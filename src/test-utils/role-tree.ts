import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

/**
 * Create a throwaway project root. Each entry is a path relative to the root;
 * entries ending in `/` become directories, anything else an empty file.
 *
 * ```typescript
 * const root = makeRoleTree(['roles/net/ssh/molecule/default/', 'playbooks/site.yml']);
 * ```
 */
export function makeRoleTree(entries: string[]): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'role-pipeline-'));
  for (const entry of entries) {
    const abs = path.join(root, entry);
    if (entry.endsWith('/')) {
      fs.mkdirSync(abs, { recursive: true });
    } else {
      fs.mkdirSync(path.dirname(abs), { recursive: true });
      fs.writeFileSync(abs, '---\n');
    }
  }
  return root;
}

export function removeTree(root: string) {
  fs.rmSync(root, { recursive: true, force: true });
}

/** Units with the scenario marker, as directory entries for `makeRoleTree`. */
export function markedUnits(...units: string[]): string[] {
  return units.map((u) => `roles/${u}/molecule/default/`);
}

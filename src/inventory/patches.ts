/**
 * Patch compliance: which fleet patch titles each computer has applied or is missing
 */

import { PatchTitleDetail, PatchVersionComputersSchema } from '../types/jss-api.js';
import { isRecord } from '../utils/type-guards.js';
import type { MissingPatchRow, PatchCompliance, PatchRef, UserTag } from './types.js';

export interface PatchVersion {
  version: string;
  computerIds: number[];
}

export interface PatchRecord {
  id: number;
  name: string;
  /** Computers reported on the newest version of the title */
  appliedComputerIds: ReadonlySet<number>;
  latestVersion?: string;
  /** computer id -> version, for computers reported on an older version */
  outdatedVersions?: ReadonlyMap<number, string>;
}

const toArray = (value: unknown): unknown => {
  // {computer: [...]} / {computer: {...}} wrappers show up on some servers
  if (isRecord(value) && 'computer' in value) {
    return Array.isArray(value.computer) ? value.computer : [value.computer];
  }
  return value;
};

/**
 * Versions come either as objects carrying `software_version`, or as an
 * alternating list where a version string precedes its `{computers}` object.
 */
export function parsePatchVersions(versions: readonly unknown[] | undefined): PatchVersion[] {
  const parsed: PatchVersion[] = [];
  let pendingVersion: string | undefined;

  for (const row of versions ?? []) {
    if (typeof row === 'string' || typeof row === 'number') {
      pendingVersion = String(row);
      continue;
    }
    if (!isRecord(row)) continue;

    const version = typeof row.software_version === 'string' ? row.software_version : pendingVersion;
    pendingVersion = undefined;

    const computers = PatchVersionComputersSchema.parse(toArray(row.computers)) ?? [];
    parsed.push({
      version: version ?? 'Unknown',
      computerIds: computers.map((computer) => computer.id),
    });
  }

  return parsed;
}

/**
 * The first version listed is the newest one; computers on it have the patch
 * applied. Computers on any later (older) version are missing the patch and
 * keep that version as their installed one.
 *
 * Note: this differs from reading every listed version, the first included,
 * as unpatched. A computer already on the newest version is not reported as
 * missing the title here.
 */
export function parsePatchRecord(id: number, detail: PatchTitleDetail): PatchRecord {
  const versions = parsePatchVersions(detail.versions);
  const [latest, ...older] = versions;
  const applied = new Set(latest?.computerIds ?? []);

  const outdated = new Map<number, string>();
  for (const version of older) {
    for (const computerId of version.computerIds) {
      if (!applied.has(computerId) && !outdated.has(computerId)) {
        outdated.set(computerId, version.version);
      }
    }
  }

  return {
    id: detail.id ?? id,
    name: detail.name,
    appliedComputerIds: applied,
    latestVersion: latest?.version,
    outdatedVersions: outdated,
  };
}

export const toPatchRef = (patch: PatchRecord): PatchRef => ({ id: patch.id, name: patch.name });

/**
 * Split the fleet patch set into applied and missing for one computer.
 * applied ∪ missing is the whole set and the two never overlap.
 */
export function computePatchCompliance(computerId: number, patches: readonly PatchRecord[]): PatchCompliance {
  const compliance: PatchCompliance = { applied: [], missing: [] };
  const seen = new Set<number>();

  for (const patch of patches) {
    if (seen.has(patch.id)) continue;
    seen.add(patch.id);
    if (patch.appliedComputerIds.has(computerId)) {
      compliance.applied.push(toPatchRef(patch));
    } else {
      compliance.missing.push(toPatchRef(patch));
    }
  }

  return compliance;
}

/**
 * One row per missing patch, for CSV output
 */
export function flattenMissingPatches(
  tag: UserTag,
  username: string,
  missing: readonly PatchRef[],
  patchesById: ReadonlyMap<number, PatchRecord>
): MissingPatchRow[] {
  return missing.map((patch) => ({
    computerId: tag.computerId,
    username,
    name: tag.name,
    email: tag.email,
    serialNumber: tag.serialNumber,
    patchId: patch.id,
    application: patch.name,
    installedVersion: patchesById.get(patch.id)?.outdatedVersions?.get(tag.computerId) ?? 'N/A',
  }));
}

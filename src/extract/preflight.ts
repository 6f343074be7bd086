import { statfs } from 'node:fs/promises';
import { ArchiveError } from '../errors.js';
import type { FreeSpaceProbe } from '../types.js';

export type SpaceRequirement = {
  /** Sum of the uncompressed sizes of the batch. */
  payloadBytes: number;
  /** Payload plus margin plus headroom. */
  neededBytes: number;
};

/** Free bytes an unprivileged writer can use on the filesystem holding `dir`. */
export const statfsFreeSpace: FreeSpaceProbe = async (dir) => {
  const info = await statfs(dir);
  return info.bavail * info.bsize;
};

export function spaceRequirement(payloadBytes: number, marginRatio: number, headroomBytes: number): SpaceRequirement {
  return {
    payloadBytes,
    neededBytes: Math.floor(payloadBytes * (1 + marginRatio)) + headroomBytes
  };
}

/**
 * Fail before anything is written when `dir` cannot hold the batch.
 *
 * @throws ArchiveError `ARCHIVE_INSUFFICIENT_SPACE`
 */
export async function assertFreeSpace(
  dir: string,
  requirement: SpaceRequirement,
  probe: FreeSpaceProbe
): Promise<void> {
  const free = await probe(dir);
  if (free >= requirement.neededBytes) return;
  throw new ArchiveError(
    'ARCHIVE_INSUFFICIENT_SPACE',
    `Insufficient free space in ${dir}: need ~${formatMegabytes(requirement.neededBytes)} MB, ` +
      `have ~${formatMegabytes(free)} MB`,
    {
      context: {
        extractDir: dir,
        neededBytes: String(requirement.neededBytes),
        freeBytes: String(free)
      }
    }
  );
}

function formatMegabytes(bytes: number): string {
  return (bytes / 1e6).toFixed(1);
}

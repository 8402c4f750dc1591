export interface SnapshotDiff {
  /** In both snapshots. No action. */
  unchanged: string[];
  /** Only in the previous snapshot, in previous-snapshot order. */
  disappeared: string[];
  /** Only in the current snapshot, in current-snapshot order. */
  arrived: string[];
}

/**
 * Partition the card ids of two consecutive snapshots.
 * previous = unchanged ∪ disappeared, current = unchanged ∪ arrived.
 */
export function diffSnapshots(previousIds: Iterable<string>, currentIds: Iterable<string>): SnapshotDiff {
  const previous = new Set(previousIds);
  const current = new Set(currentIds);

  const unchanged: string[] = [];
  const disappeared: string[] = [];
  for (const id of previous) {
    if (current.has(id)) unchanged.push(id);
    else disappeared.push(id);
  }

  const arrived: string[] = [];
  for (const id of current) {
    if (!previous.has(id)) arrived.push(id);
  }

  return { unchanged, disappeared, arrived };
}

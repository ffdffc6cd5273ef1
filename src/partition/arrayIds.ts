import type { ArrayIdPartitions, RowSequence } from '../dataset/Row';
import { valueToString } from '../dataset/values';

/**
 * Split mixed array data by array ID (each row's first value), keeping only
 * `arrayIds` when any are given.
 *
 * Already partitioned data is filtered down to `arrayIds`, or returned as is
 * when none are given. Rows without any values are skipped.
 */
export function filterMixedArrayData(
  data: RowSequence | ArrayIdPartitions,
  arrayIds: readonly string[] = []
): ArrayIdPartitions {
  const filtered: ArrayIdPartitions = new Map();

  if (data instanceof Map) {
    if (arrayIds.length === 0) return data;
    for (const [arrayId, arrayIdData] of data) {
      if (arrayIds.includes(arrayId)) {
        filtered.set(arrayId, arrayIdData);
      }
    }
    return filtered;
  }

  for (const row of data) {
    const [first] = row.values();
    if (first === undefined) continue;

    const arrayId = valueToString(first);
    if (arrayIds.length > 0 && !arrayIds.includes(arrayId)) continue;

    const partition = filtered.get(arrayId);
    if (partition) {
      partition.push(row);
    } else {
      filtered.set(arrayId, [row]);
    }
  }
  return filtered;
}

/**
 * Re-key partitions through a lookup of array ID to name. Array IDs without a
 * (non-empty) name keep their ID.
 */
export function renameArrayIds(
  partitions: ArrayIdPartitions,
  names: Record<string, string | null>
): ArrayIdPartitions {
  const renamed: ArrayIdPartitions = new Map();
  for (const [arrayId, rows] of partitions) {
    const name = names[arrayId];
    renamed.set(name ? name : arrayId, rows);
  }
  return renamed;
}

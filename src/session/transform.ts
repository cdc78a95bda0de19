/**
 * Session Module - Pure Transformations
 *
 * Raw state updates and composition of masked writes.
 */
import type { DataPointMap } from "../codec/index.js";
import { applyMask, type DataPointWrite } from "../translator/index.js";

/**
 * Apply a batch of data points to the raw state. Returns a new frozen map.
 */
export function applyDataPoints(
  state: DataPointMap,
  changes: DataPointMap,
): DataPointMap {
  return Object.freeze({ ...state, ...changes });
}

/**
 * The subset of `incoming` whose values differ from `state`.
 */
export function changedDataPoints(
  state: DataPointMap,
  incoming: DataPointMap,
): DataPointMap {
  const changed: Record<string, number> = {};
  for (const [dpid, value] of Object.entries(incoming)) {
    if (state[dpid] !== value) changed[dpid] = value;
  }
  return changed;
}

/**
 * Compose the SET payload for `writes`.
 *
 * Masked writes start from the current raw value with every in-flight masked
 * write to the same DPID already applied, so concurrent gang commands do not
 * undo each other.
 */
export function composeWrites(
  writes: readonly DataPointWrite[],
  state: DataPointMap,
  inflight: readonly DataPointWrite[],
): DataPointMap {
  const data: Record<string, number> = {};

  for (const write of writes) {
    const key = String(write.dpid);
    if (write.kind === "value") {
      data[key] = write.value;
      continue;
    }

    let base = data[key];
    if (base === undefined) {
      base = state[key] ?? 0;
      for (const pending of inflight) {
        if (pending.kind === "mask" && pending.dpid === write.dpid) {
          base = applyMask(base, pending.mask, pending.on);
        }
      }
    }
    data[key] = applyMask(base, write.mask, write.on);
  }

  return data;
}

/**
 * The state changes an acknowledged write stands for. Masked writes become
 * bit updates on the current value, not the value sent.
 */
export function acknowledgedChanges(
  writes: readonly DataPointWrite[],
  state: DataPointMap,
): DataPointMap {
  const changes: Record<string, number> = {};

  for (const write of writes) {
    const key = String(write.dpid);
    if (write.kind === "value") {
      changes[key] = write.value;
    } else {
      const current = changes[key] ?? state[key] ?? 0;
      changes[key] = applyMask(current, write.mask, write.on);
    }
  }

  return changes;
}

/**
 * DPIDs touched by a set of writes, ascending.
 */
export function writtenDpids(writes: readonly DataPointWrite[]): number[] {
  return Array.from(new Set(writes.map((write) => write.dpid))).sort(
    (a, b) => a - b,
  );
}

import { freezeFleet } from './snapshot.js';
import type { FleetSnapshot } from './types.js';

/**
 * Holds the current fleet snapshot. Published snapshots are frozen and only
 * ever replaced as a whole, so `read()` hands out the same reference until the
 * next publish.
 */
export const createStateStore = (initial: FleetSnapshot) => {
  const indexLastSeen = (snapshot: FleetSnapshot) => {
    const next = new Map<string, number>();
    for (const device of snapshot.devices) {
      if (device.lastSeen !== undefined) next.set(device.id, device.lastSeen);
    }
    return next;
  };

  let current = freezeFleet(initial);
  let lastSeenById = indexLastSeen(current);

  const read = () => current;

  const publish = (snapshot: FleetSnapshot) => {
    const frozen = freezeFleet(snapshot);
    const index = indexLastSeen(frozen);
    current = frozen;
    lastSeenById = index;
    return frozen;
  };

  const lastSeen = (deviceId: string) => lastSeenById.get(deviceId);

  return {
    read,
    publish,
    lastSeen,
  };
};

export type StateStore = ReturnType<typeof createStateStore>;

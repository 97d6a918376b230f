import type { Reservation } from '../../../domain/reservation';
import type { ResourceId } from '../../../domain/resource';
import type { TimeSlot } from '../../../domain/timeSlot';

interface IndexEntry {
  readonly startMs: number;
  readonly endMs: number;
  readonly reservation: Reservation;
}

interface Timeline {
  /** Sorted by `startMs`, then reservation id. */
  entries: IndexEntry[];
  /** Upper bound on entry duration; never shrinks until the timeline is emptied. */
  maxDurationMs: number;
}

export interface OverlapOptions {
  /** Ignore this reservation, e.g. the one being rescheduled. */
  excludeId?: string;
}

/** Index of the first element for which `predicate` holds; `predicate` must be monotone. */
function firstIndex(entries: IndexEntry[], predicate: (entry: IndexEntry) => boolean): number {
  let low = 0;
  let high = entries.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (predicate(entries[mid])) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }
  return low;
}

function compareEntries(a: IndexEntry, b: IndexEntry): number {
  return a.startMs - b.startMs || a.reservation.id.localeCompare(b.reservation.id);
}

/**
 * Per-resource projection of active (pending or confirmed) reservations. It is
 * derived state: `rebuild` restores it from the reservation repository.
 *
 * A query binary-searches the window `(slot.start - maxDuration, slot.end)` of
 * start instants, so only entries that could overlap are visited.
 */
export class AvailabilityIndex {
  private readonly timelines = new Map<ResourceId, Timeline>();
  private readonly locations = new Map<string, IndexEntry & { resourceId: ResourceId }>();

  insert(reservation: Reservation): void {
    if (!reservation.isActive) {
      return;
    }

    this.remove(reservation.id);

    const entry: IndexEntry = {
      startMs: reservation.slot.startMs,
      endMs: reservation.slot.endMs,
      reservation
    };

    let timeline = this.timelines.get(reservation.resourceId);
    if (!timeline) {
      timeline = { entries: [], maxDurationMs: 0 };
      this.timelines.set(reservation.resourceId, timeline);
    }

    const position = firstIndex(timeline.entries, (candidate) => compareEntries(candidate, entry) > 0);
    timeline.entries.splice(position, 0, entry);
    timeline.maxDurationMs = Math.max(timeline.maxDurationMs, entry.endMs - entry.startMs);

    this.locations.set(reservation.id, { ...entry, resourceId: reservation.resourceId });
  }

  remove(reservationId: string): boolean {
    const location = this.locations.get(reservationId);
    if (!location) {
      return false;
    }

    this.locations.delete(reservationId);
    const timeline = this.timelines.get(location.resourceId);
    if (!timeline) {
      return false;
    }

    const position = firstIndex(timeline.entries, (candidate) => compareEntries(candidate, location) >= 0);
    if (timeline.entries[position]?.reservation.id !== reservationId) {
      return false;
    }

    timeline.entries.splice(position, 1);
    if (timeline.entries.length === 0) {
      this.timelines.delete(location.resourceId);
    }
    return true;
  }

  has(reservationId: string): boolean {
    return this.locations.has(reservationId);
  }

  overlapping(resourceId: ResourceId, slot: TimeSlot, options: OverlapOptions = {}): Reservation[] {
    const matches: Reservation[] = [];
    this.scan(resourceId, slot, options, (entry) => {
      matches.push(entry.reservation);
    });
    return matches;
  }

  countOverlapping(resourceId: ResourceId, slot: TimeSlot, options: OverlapOptions = {}): number {
    let count = 0;
    this.scan(resourceId, slot, options, () => {
      count += 1;
    });
    return count;
  }

  /** Active reservations of a resource in start order. */
  entriesFor(resourceId: ResourceId): Reservation[] {
    return this.timelines.get(resourceId)?.entries.map((entry) => entry.reservation) ?? [];
  }

  size(): number {
    return this.locations.size;
  }

  rebuild(reservations: Iterable<Reservation>): void {
    this.clear();
    for (const reservation of reservations) {
      this.insert(reservation);
    }
  }

  clear(): void {
    this.timelines.clear();
    this.locations.clear();
  }

  private scan(
    resourceId: ResourceId,
    slot: TimeSlot,
    options: OverlapOptions,
    visit: (entry: IndexEntry) => void
  ): void {
    const timeline = this.timelines.get(resourceId);
    if (!timeline) {
      return;
    }

    const { entries, maxDurationMs } = timeline;
    const earliestStart = slot.startMs - maxDurationMs;
    const low = firstIndex(entries, (entry) => entry.startMs > earliestStart);
    const high = firstIndex(entries, (entry) => entry.startMs >= slot.endMs);

    for (let i = low; i < high; i += 1) {
      const entry = entries[i];
      if (entry.endMs > slot.startMs && entry.reservation.id !== options.excludeId) {
        visit(entry);
      }
    }
  }
}

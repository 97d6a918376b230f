import { ValidationError } from '@makerspace/shared';

export interface TimeSlotInput {
  start: Date | string;
  end: Date | string;
}

/**
 * Half-open interval `[start, end)`. Two slots overlap iff
 * `max(startA, startB) < min(endA, endB)`, so back-to-back slots do not collide.
 */
export class TimeSlot {
  private constructor(
    public readonly start: Date,
    public readonly end: Date
  ) {}

  /** Returns `null` when either instant is unparseable or `start >= end`. */
  static tryCreate(input: TimeSlotInput): TimeSlot | null {
    const start = new Date(input.start);
    const end = new Date(input.end);

    if (Number.isNaN(start.valueOf()) || Number.isNaN(end.valueOf())) {
      return null;
    }

    if (start.getTime() >= end.getTime()) {
      return null;
    }

    return new TimeSlot(start, end);
  }

  static of(input: TimeSlotInput): TimeSlot {
    const slot = TimeSlot.tryCreate(input);
    if (!slot) {
      throw new ValidationError('Slot end must be after start', {
        start: String(input.start),
        end: String(input.end)
      });
    }
    return slot;
  }

  get startMs(): number {
    return this.start.getTime();
  }

  get endMs(): number {
    return this.end.getTime();
  }

  get durationMs(): number {
    return this.endMs - this.startMs;
  }

  overlaps(other: TimeSlot): boolean {
    return Math.max(this.startMs, other.startMs) < Math.min(this.endMs, other.endMs);
  }

  contains(instant: Date): boolean {
    const at = instant.getTime();
    return this.startMs <= at && at < this.endMs;
  }

  toJSON(): { start: string; end: string } {
    return {
      start: this.start.toISOString(),
      end: this.end.toISOString()
    };
  }
}

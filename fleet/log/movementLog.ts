// ============================================================================
// MOVEMENT LOG - Fixed-capacity ring buffer, oldest record evicted first
// ============================================================================

import type { MovementRecord } from '../reports/types';

export class MovementLog {
  readonly capacity: number;
  /** Grows on demand up to capacity, then slots are reused */
  private readonly slots: MovementRecord[] = [];
  /** Index of the oldest record once the buffer is full */
  private head = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Invalid movement log capacity: ${capacity}. Must be a non-negative integer.`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.slots.length;
  }

  /** O(1) amortized. When full, the new record takes the oldest record's slot. */
  append(record: MovementRecord): void {
    if (this.capacity === 0) {
      return;
    }

    if (this.slots.length < this.capacity) {
      this.slots.push(record);
      return;
    }

    this.slots[this.head] = record;
    this.head = (this.head + 1) % this.capacity;
  }

  /** Copy of the current contents in insertion order */
  snapshot(): readonly MovementRecord[] {
    return Object.freeze([...this.slots.slice(this.head), ...this.slots.slice(0, this.head)]);
  }
}

import type { StateChange } from "@wayfarer/shared";

/**
 * Mutation batch for one tool call. Each engine service appends what it
 * changed; the executor returns the batch with the tool result.
 */
export class ChangeLog {
  private readonly entries: StateChange[] = [];

  record(change: StateChange): void {
    this.entries.push(change);
  }

  list(): StateChange[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}

import type { ConversationEntry } from "./types";

function freezeEntry(entry: ConversationEntry): ConversationEntry {
  switch (entry.role) {
    case "assistant":
      return Object.freeze({
        ...entry,
        ...(entry.toolRequests
          ? {
              toolRequests: Object.freeze(
                entry.toolRequests.map((request) => Object.freeze({ ...request }))
              ),
            }
          : {}),
      });
    case "tool":
      return Object.freeze({ ...entry, result: Object.freeze({ ...entry.result }) });
    default:
      return Object.freeze({ ...entry });
  }
}

/**
 * Append-only record of one agent run. Entries are copied and frozen on the
 * way in and never change afterwards; `entries()` returns a snapshot.
 */
export class ConversationLog {
  private readonly items: ConversationEntry[] = [];

  constructor(seed: readonly ConversationEntry[] = []) {
    for (const entry of seed) this.append(entry);
  }

  append(entry: ConversationEntry): ConversationEntry {
    const frozen = freezeEntry(entry);
    this.items.push(frozen);
    return frozen;
  }

  entries(): readonly ConversationEntry[] {
    return Object.freeze([...this.items]);
  }

  get length(): number {
    return this.items.length;
  }
}

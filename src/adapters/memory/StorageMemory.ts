import { z } from "zod";
import type { MemoryPort, MemoryTurn } from "../../ports/memory/MemoryPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { StoragePort } from "../../ports/sys/StoragePort";

export const MAX_STORED_TURNS = 50;
export const RECALLED_TURNS = 5;

const turnsSchema = z.array(
  z.object({
    user: z.string(),
    assistant: z.string(),
    at: z.string(),
  })
);

export interface StorageMemoryOptions {
  maxStoredTurns?: number;
  recalledTurns?: number;
}

/**
 * Keeps each user's recent turns as a JSON array in a StoragePort and
 * recalls the newest few as plain-text context for the system prompt.
 */
export class StorageMemory implements MemoryPort {
  private readonly maxStoredTurns: number;
  private readonly recalledTurns: number;

  constructor(
    private readonly storage: StoragePort,
    private readonly logger: LoggerPort,
    options: StorageMemoryOptions = {}
  ) {
    this.maxStoredTurns = options.maxStoredTurns ?? MAX_STORED_TURNS;
    this.recalledTurns = options.recalledTurns ?? RECALLED_TURNS;
  }

  async recall(userId: string): Promise<string | null> {
    const turns = (await this.load(userId)).slice(-this.recalledTurns);
    if (!turns.length) return null;
    return turns.map((turn) => `User: ${turn.user}\nAssistant: ${turn.assistant}`).join("\n");
  }

  async persist(userId: string, turn: MemoryTurn): Promise<void> {
    const turns = [...(await this.load(userId)), turn].slice(-this.maxStoredTurns);
    await this.storage.write(keyFor(userId), JSON.stringify(turns));
  }

  private async load(userId: string): Promise<MemoryTurn[]> {
    const raw = await this.storage.read(keyFor(userId));
    if (raw === null) return [];

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.logger.warn(`[memory] stored turns for ${userId} are not JSON; starting fresh`, {
        error: err,
      });
      return [];
    }
    const parsed = turnsSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(`[memory] stored turns for ${userId} are malformed; starting fresh`);
      return [];
    }
    return parsed.data;
  }
}

function keyFor(userId: string): string {
  return `memory-${userId}`;
}

export interface MemoryTurn {
  user: string;
  assistant: string;
  at: string;
}

export interface MemoryPort {
  /** Prior context for `userId`, or null when there is nothing worth recalling. */
  recall(userId: string): Promise<string | null>;
  persist(userId: string, turn: MemoryTurn): Promise<void>;
}

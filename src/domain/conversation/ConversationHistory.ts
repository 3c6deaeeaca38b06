import type { ConversationTurn } from "./types";
import { toolResults, toolUses } from "./types";

export class HistoryInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HistoryInvariantError";
  }
}

/**
 * Append-only record of one session. Turns are replayed to the model in
 * insertion order on every request, so nothing is ever edited in place.
 */
export class ConversationHistory {
  private readonly entries: ConversationTurn[] = [];

  get length(): number {
    return this.entries.length;
  }

  turns(): ConversationTurn[] {
    return this.entries.map((turn) => ({ role: turn.role, content: [...turn.content] }));
  }

  last(): ConversationTurn | undefined {
    return this.entries[this.entries.length - 1];
  }

  /** Ids of tool_use blocks in the latest turn that still lack a result. */
  pendingToolUseIds(): string[] {
    const last = this.last();
    if (!last || last.role !== "assistant") return [];
    return toolUses(last).map((block) => block.id);
  }

  append(turn: ConversationTurn): void {
    const pending = this.pendingToolUseIds();
    if (pending.length > 0) {
      if (turn.role !== "user") {
        throw new HistoryInvariantError(
          `Expected tool results for ${pending.join(", ")} before another ${turn.role} turn.`
        );
      }
      const answered = new Set(toolResults(turn).map((block) => block.toolUseId));
      const missing = pending.filter((id) => !answered.has(id));
      if (missing.length > 0) {
        throw new HistoryInvariantError(`Missing tool results for ${missing.join(", ")}.`);
      }
    }
    this.entries.push({ role: turn.role, content: [...turn.content] });
  }
}

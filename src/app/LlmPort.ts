import type { ConversationTurn } from "../domain/conversation/types";
import type { ToolDeclaration } from "../shared/contracts";

export interface LlmPort {
  /**
   * Sends the whole ordered history plus the tool declarations and resolves
   * with the assistant's next turn. Rejects with ModelTransportError.
   */
  complete(history: ConversationTurn[], tools: ToolDeclaration[]): Promise<ConversationTurn>;
}

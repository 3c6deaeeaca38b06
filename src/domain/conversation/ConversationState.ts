import type { ConversationStateValue } from "./types";

export class ConversationState {
  private current: ConversationStateValue = "AwaitingUserInput";

  get value(): ConversationStateValue {
    return this.current;
  }

  toAwaitingUserInput() {
    this.current = "AwaitingUserInput";
  }

  toAwaitingModelResponse() {
    this.current = "AwaitingModelResponse";
  }

  toExecutingTools() {
    this.current = "ExecutingTools";
  }

  toFinished() {
    this.current = "Finished";
  }
}

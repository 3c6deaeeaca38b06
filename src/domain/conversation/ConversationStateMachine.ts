import { ConversationState } from "./ConversationState";

export class ConversationStateMachine {
  constructor(private readonly state: ConversationState) {}

  onUserLine() {
    if (this.state.value === "AwaitingUserInput") {
      this.state.toAwaitingModelResponse();
    }
  }

  onEndOfInput() {
    if (this.state.value === "AwaitingUserInput") {
      this.state.toFinished();
    }
  }

  onModelReply(hasToolCalls: boolean) {
    if (this.state.value !== "AwaitingModelResponse") return;
    if (hasToolCalls) {
      this.state.toExecutingTools();
    } else {
      this.state.toAwaitingUserInput();
    }
  }

  // Tool results go straight back to the model; the user is not prompted.
  onToolsExecuted() {
    if (this.state.value === "ExecutingTools") {
      this.state.toAwaitingModelResponse();
    }
  }

  onFatalError() {
    this.state.toFinished();
  }
}

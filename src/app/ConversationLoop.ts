import { ConversationState } from "../domain/conversation/ConversationState";
import { ConversationStateMachine } from "../domain/conversation/ConversationStateMachine";
import { ConversationHistory } from "../domain/conversation/ConversationHistory";
import type {
  ConversationStateValue,
  ConversationTurn,
  ToolResultBlock,
  ToolUseBlock,
} from "../domain/conversation/types";
import { textTurn } from "../domain/conversation/types";
import type { UserInputPort } from "../ports/io/UserInputPort";
import type { TranscriptPort } from "../ports/io/TranscriptPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { ToolRegistryPort } from "../ports/tools/ToolRegistryPort";
import type { LlmPort } from "./LlmPort";
import type { ToolDispatcher } from "./ToolDispatcher";
import { errorMessage } from "../shared/errors";

/**
 * Strictly sequential REPL: one model request at a time and one tool at a
 * time, in the order the model asked for them. Tool results are resubmitted
 * to the model without prompting the user again.
 */
export class ConversationLoop {
  private readonly state = new ConversationState();
  private readonly stateMachine = new ConversationStateMachine(this.state);
  private pending: ToolUseBlock[] = [];

  constructor(
    private readonly llm: LlmPort,
    private readonly tools: ToolRegistryPort,
    private readonly dispatcher: ToolDispatcher,
    private readonly input: UserInputPort,
    private readonly transcript: TranscriptPort,
    private readonly logger: LoggerPort
  ) {}

  get currentState(): ConversationStateValue {
    return this.state.value;
  }

  /**
   * Runs until input ends. A model failure rejects; the session is over at
   * that point and the caller reports it.
   */
  async run(history: ConversationHistory = new ConversationHistory()): Promise<ConversationHistory> {
    this.transcript.showBanner();

    for (;;) {
      const before = this.state.value;
      switch (this.state.value) {
        case "AwaitingUserInput":
          await this.readUserTurn(history);
          break;
        case "AwaitingModelResponse":
          await this.requestModelTurn(history);
          break;
        case "ExecutingTools":
          await this.executeTools(history);
          break;
        case "Finished":
          return history;
      }
      this.logger.debug("Conversation state", { from: before, to: this.state.value });
    }
  }

  private async readUserTurn(history: ConversationHistory) {
    this.transcript.showPrompt();
    const line = await this.input.readLine();
    if (line === null) {
      this.stateMachine.onEndOfInput();
      return;
    }
    history.append(textTurn("user", line));
    this.stateMachine.onUserLine();
  }

  private async requestModelTurn(history: ConversationHistory) {
    let reply: ConversationTurn;
    try {
      reply = await this.llm.complete(history.turns(), this.tools.list());
    } catch (err) {
      this.logger.error("Model request failed", { error: errorMessage(err) });
      this.stateMachine.onFatalError();
      throw err;
    }
    history.append(reply);

    const calls: ToolUseBlock[] = [];
    for (const block of reply.content) {
      if (block.type === "text") {
        this.transcript.showAssistantText(block.text);
      } else if (block.type === "tool_use") {
        calls.push(block);
      }
    }
    this.pending = calls;
    this.stateMachine.onModelReply(calls.length > 0);
  }

  private async executeTools(history: ConversationHistory) {
    const results: ToolResultBlock[] = [];
    for (const call of this.pending) {
      results.push(await this.dispatcher.dispatch(call));
    }
    this.pending = [];
    history.append({ role: "user", content: results });
    this.stateMachine.onToolsExecuted();
  }
}

import type {
  ChatCompletion,
  ChatCompletionAssistantMessageParam,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources";
import type { LlmPort } from "../../app/LlmPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type {
  ContentBlock,
  ConversationTurn,
  TextBlock,
} from "../../domain/conversation/types";
import { toolResults, toolUses } from "../../domain/conversation/types";
import type { ToolDeclaration } from "../../shared/contracts";
import { ModelTransportError, errorMessage } from "../../shared/errors";
import { getOpenAI } from "../../openai";

export interface OpenAiLlmOptions {
  model: string;
  maxTokens: number;
  systemPrompt?: string;
}

export function toToolSpecs(tools: ToolDeclaration[]): ChatCompletionTool[] {
  return tools.map((tool) => ({
    type: "function" as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.schema,
    },
  }));
}

function joinText(blocks: ContentBlock[]): string {
  return blocks
    .filter((block): block is TextBlock => block.type === "text")
    .map((block) => block.text)
    .join("\n");
}

function toAssistantMessage(turn: ConversationTurn): ChatCompletionAssistantMessageParam {
  const text = joinText(turn.content);
  const calls = toolUses(turn).map((block) => ({
    id: block.id,
    type: "function" as const,
    function: { name: block.name, arguments: block.input || "{}" },
  }));
  if (!calls.length) {
    return { role: "assistant", content: text };
  }
  // tool messages must follow an assistant message that declares the calls.
  return { role: "assistant", content: text || null, tool_calls: calls };
}

function toUserMessages(turn: ConversationTurn): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = toolResults(turn).map((block) => ({
    role: "tool" as const,
    tool_call_id: block.toolUseId,
    content: JSON.stringify({ ok: !block.isError, message: block.output }),
  }));
  const text = joinText(turn.content);
  if (text || messages.length === 0) {
    messages.push({ role: "user", content: text });
  }
  return messages;
}

export function toChatMessages(
  history: ConversationTurn[],
  systemPrompt?: string
): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [];
  if (systemPrompt) {
    messages.push({ role: "system", content: systemPrompt });
  }
  for (const turn of history) {
    if (turn.role === "assistant") {
      messages.push(toAssistantMessage(turn));
    } else {
      messages.push(...toUserMessages(turn));
    }
  }
  return messages;
}

export function fromChatCompletion(completion: ChatCompletion): ConversationTurn {
  const message = completion.choices?.[0]?.message;
  if (!message) {
    throw new ModelTransportError("LLM returned no assistant message.");
  }

  const content: ContentBlock[] = [];
  if (typeof message.content === "string" && message.content.length > 0) {
    content.push({ type: "text", text: message.content });
  }
  for (const call of message.tool_calls ?? []) {
    if (call.type !== "function") continue;
    content.push({
      type: "tool_use",
      id: call.id,
      name: call.function.name,
      input: call.function.arguments,
    });
  }
  return { role: "assistant", content };
}

export class OpenAiLlmAdapter implements LlmPort {
  constructor(
    private readonly options: OpenAiLlmOptions,
    private readonly logger: LoggerPort
  ) {}

  async complete(
    history: ConversationTurn[],
    tools: ToolDeclaration[]
  ): Promise<ConversationTurn> {
    const messages = toChatMessages(history, this.options.systemPrompt);
    this.logger.debug("OpenAI request", {
      model: this.options.model,
      messages: messages.length,
      tools: tools.map((tool) => tool.name),
    });

    let completion: ChatCompletion;
    try {
      const client = getOpenAI();
      completion = await client.chat.completions.create({
        model: this.options.model,
        max_tokens: this.options.maxTokens,
        messages,
        tools: tools.length ? toToolSpecs(tools) : undefined,
      });
    } catch (err) {
      throw new ModelTransportError(`Model request failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const turn = fromChatCompletion(completion);
    this.logger.debug("OpenAI response", {
      finishReason: completion.choices[0]?.finish_reason,
      blocks: turn.content.map((block) => block.type),
    });
    return turn;
  }
}

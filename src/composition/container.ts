import path from "path";
import {
  AGENT_WORKDIR,
  ASSISTANT_LABEL,
  DEBUG_MODE,
  OPENAI_MAX_TOKENS,
  OPENAI_TEXT_MODEL,
} from "../env";
import { ConsoleLogger } from "../adapters/sys/ConsoleLogger";
import { FunctionToolRegistry, bindTool } from "../adapters/tools/FunctionToolRegistry";
import { OpenAiLlmAdapter } from "../adapters/tools/OpenAiLlmAdapter";
import { ReadlineUserInput } from "../adapters/io/ReadlineUserInput";
import { ConsoleTranscript } from "../adapters/io/ConsoleTranscript";
import { ToolDispatcher } from "../app/ToolDispatcher";
import { ConversationLoop } from "../app/ConversationLoop";
import { ConversationHistory } from "../domain/conversation/ConversationHistory";
import type { ToolDefinition } from "../ports/tools/ToolRegistryPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import { ReadFileTool } from "../features/FileTools/ReadFileTool";
import { ListFilesTool } from "../features/FileTools/ListFilesTool";
import { EditFileTool } from "../features/FileTools/EditFileTool";
import { MakeDirectoryTool } from "../features/DirectoryTools/MakeDirectoryTool";
import { RemoveDirectoryTool } from "../features/DirectoryTools/RemoveDirectoryTool";
import { RenameDirectoryTool } from "../features/DirectoryTools/RenameDirectoryTool";

export interface ApplicationInstance {
  run(): Promise<ConversationHistory>;
  showError(message: string): void;
  shutdown(): void;
}

export function buildFileTools(workdir: string): ToolDefinition[] {
  return [
    bindTool(new ReadFileTool(workdir)),
    bindTool(new ListFilesTool(workdir)),
    bindTool(new EditFileTool(workdir)),
    bindTool(new MakeDirectoryTool(workdir)),
    bindTool(new RemoveDirectoryTool(workdir)),
    bindTool(new RenameDirectoryTool(workdir)),
  ];
}

export function buildApplication(): ApplicationInstance {
  const workdir = path.resolve(AGENT_WORKDIR);
  const logger: LoggerPort = new ConsoleLogger({ level: DEBUG_MODE ? "debug" : "warn" });

  const tools = new FunctionToolRegistry(buildFileTools(workdir));
  logger.debug("Registered tools", { tools: tools.list().map((tool) => tool.name), workdir });

  const llm = new OpenAiLlmAdapter(
    {
      model: OPENAI_TEXT_MODEL,
      maxTokens: OPENAI_MAX_TOKENS,
      systemPrompt: buildSystemPrompt(workdir),
    },
    logger
  );

  const transcript = new ConsoleTranscript({ assistantLabel: ASSISTANT_LABEL });
  const input = new ReadlineUserInput();
  const dispatcher = new ToolDispatcher(
    tools,
    (name, rawArgs) => transcript.showToolCall(name, rawArgs),
    logger
  );
  const loop = new ConversationLoop(llm, tools, dispatcher, input, transcript, logger);

  return {
    run: () => loop.run(new ConversationHistory()),
    showError: (message) => transcript.showError(message),
    shutdown: () => input.close(),
  };
}

function buildSystemPrompt(workdir: string): string {
  return `You are a coding assistant working in the directory ${workdir}.
You can inspect and change files only through the provided tools. Paths are relative to that directory.
Read a file before editing it. When a tool reports an error, explain it or try a different approach instead of claiming success.
Be concise.`;
}

import {
  OpenAiLlmAdapter,
  toChatMessages,
  toToolSpecs,
} from "../../../src/adapters/tools/OpenAiLlmAdapter";
import type { ConversationTurn } from "../../../src/domain/conversation/types";
import type { LoggerPort } from "../../../src/ports/sys/LoggerPort";
import type { ToolDeclaration } from "../../../src/shared/contracts";
import { ModelTransportError } from "../../../src/shared/errors";

const mockCreate = jest.fn();

jest.mock("../../../src/openai", () => ({
  getOpenAI: () => ({
    chat: {
      completions: {
        create: mockCreate,
      },
    },
  }),
}));

const logger: LoggerPort = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };

const readFile: ToolDeclaration = {
  name: "read_file",
  description: "Read a file",
  schema: {
    type: "object",
    properties: { path: { type: "string" } },
    required: ["path"],
    additionalProperties: false,
  },
};

const history: ConversationTurn[] = [
  { role: "user", content: [{ type: "text", text: "show a.txt" }] },
  {
    role: "assistant",
    content: [
      { type: "text", text: "Reading it." },
      { type: "tool_use", id: "call_1", name: "read_file", input: '{"path":"a.txt"}' },
    ],
  },
  {
    role: "user",
    content: [{ type: "tool_result", toolUseId: "call_1", output: "hello", isError: false }],
  },
];

describe("toChatMessages", () => {
  test("maps turns onto chat messages in order", () => {
    expect(toChatMessages(history, "be brief")).toEqual([
      { role: "system", content: "be brief" },
      { role: "user", content: "show a.txt" },
      {
        role: "assistant",
        content: "Reading it.",
        tool_calls: [
          {
            id: "call_1",
            type: "function",
            function: { name: "read_file", arguments: '{"path":"a.txt"}' },
          },
        ],
      },
      { role: "tool", tool_call_id: "call_1", content: '{"ok":true,"message":"hello"}' },
    ]);
  });

  test("error results are flagged and tool-only assistant turns have null content", () => {
    const turns: ConversationTurn[] = [
      {
        role: "assistant",
        content: [{ type: "tool_use", id: "c", name: "read_file", input: "" }],
      },
      {
        role: "user",
        content: [{ type: "tool_result", toolUseId: "c", output: "tool not found", isError: true }],
      },
    ];
    expect(toChatMessages(turns)).toEqual([
      {
        role: "assistant",
        content: null,
        tool_calls: [{ id: "c", type: "function", function: { name: "read_file", arguments: "{}" } }],
      },
      { role: "tool", tool_call_id: "c", content: '{"ok":false,"message":"tool not found"}' },
    ]);
  });
});

describe("toToolSpecs", () => {
  test("wraps declarations as function tools", () => {
    expect(toToolSpecs([readFile])).toEqual([
      {
        type: "function",
        function: {
          name: "read_file",
          description: "Read a file",
          parameters: readFile.schema,
        },
      },
    ]);
  });
});

describe("OpenAiLlmAdapter", () => {
  beforeEach(() => {
    mockCreate.mockReset();
  });

  test("complete sends history and tools and maps the reply into blocks", async () => {
    mockCreate.mockResolvedValueOnce({
      choices: [
        {
          finish_reason: "tool_calls",
          message: {
            role: "assistant",
            content: "Let me look.",
            tool_calls: [
              {
                id: "call_7",
                type: "function",
                function: { name: "list_files", arguments: "{}" },
              },
              {
                id: "call_8",
                type: "function",
                function: { name: "read_file", arguments: '{"path":"b"}' },
              },
            ],
          },
        },
      ],
    });

    const adapter = new OpenAiLlmAdapter({ model: "test-model", maxTokens: 256 }, logger);
    const turn = await adapter.complete(history.slice(0, 1), [readFile]);

    expect(mockCreate).toHaveBeenCalledWith({
      model: "test-model",
      max_tokens: 256,
      messages: [{ role: "user", content: "show a.txt" }],
      tools: toToolSpecs([readFile]),
    });
    expect(turn).toEqual({
      role: "assistant",
      content: [
        { type: "text", text: "Let me look." },
        { type: "tool_use", id: "call_7", name: "list_files", input: "{}" },
        { type: "tool_use", id: "call_8", name: "read_file", input: '{"path":"b"}' },
      ],
    });
  });

  test("omits tools when none are registered and drops empty text", async () => {
    mockCreate.mockResolvedValueOnce({
      choices: [{ finish_reason: "stop", message: { role: "assistant", content: "" } }],
    });

    const adapter = new OpenAiLlmAdapter({ model: "m", maxTokens: 10 }, logger);
    const turn = await adapter.complete([], []);

    expect(mockCreate.mock.calls[0][0].tools).toBeUndefined();
    expect(turn).toEqual({ role: "assistant", content: [] });
  });

  test("API failures surface as ModelTransportError", async () => {
    mockCreate.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));

    const adapter = new OpenAiLlmAdapter({ model: "m", maxTokens: 10 }, logger);
    const err = await adapter.complete(history, [readFile]).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ModelTransportError);
    expect(err).toMatchObject({ message: "Model request failed: connect ECONNREFUSED" });
  });

  test("a response without choices is a ModelTransportError", async () => {
    mockCreate.mockResolvedValueOnce({ choices: [] });

    const adapter = new OpenAiLlmAdapter({ model: "m", maxTokens: 10 }, logger);
    await expect(adapter.complete(history, [])).rejects.toThrow(ModelTransportError);
  });
});

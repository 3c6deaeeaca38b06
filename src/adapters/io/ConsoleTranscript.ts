import type { Writable } from "stream";
import type { TranscriptPort } from "../../ports/io/TranscriptPort";

const COLORS = {
  blue: "\u001b[94m",
  yellow: "\u001b[93m",
  green: "\u001b[92m",
  red: "\u001b[91m",
  reset: "\u001b[0m",
} as const;

type Color = Exclude<keyof typeof COLORS, "reset">;

export interface ConsoleTranscriptOptions {
  assistantLabel: string;
  colors?: boolean;
}

export class ConsoleTranscript implements TranscriptPort {
  private readonly colors: boolean;

  constructor(
    private readonly options: ConsoleTranscriptOptions,
    private readonly out: Writable & { isTTY?: boolean } = process.stdout
  ) {
    this.colors = options.colors ?? Boolean(out.isTTY);
  }

  private label(text: string, color: Color): string {
    return this.colors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
  }

  showBanner(): void {
    this.out.write(`Chat with ${this.options.assistantLabel} (use 'ctrl-c' to quit)\n`);
  }

  showPrompt(): void {
    this.out.write(`${this.label("You", "blue")}: `);
  }

  showAssistantText(text: string): void {
    this.out.write(`${this.label(this.options.assistantLabel, "yellow")}: ${text}\n`);
  }

  showToolCall(name: string, rawArgs: string): void {
    this.out.write(`${this.label("tool", "green")}: ${name}(${rawArgs})\n`);
  }

  showError(message: string): void {
    this.out.write(`${this.label("Error", "red")}: ${message}\n`);
  }
}

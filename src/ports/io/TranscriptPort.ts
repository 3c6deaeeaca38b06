export interface TranscriptPort {
  showBanner(): void;
  showPrompt(): void;
  showAssistantText(text: string): void;
  showToolCall(name: string, rawArgs: string): void;
  showError(message: string): void;
}

export interface UserInputPort {
  /** Resolves with the next line, or null once input is exhausted. */
  readLine(): Promise<string | null>;
  close(): void;
}

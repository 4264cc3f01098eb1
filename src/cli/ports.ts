/**
 * Terminal ports
 * The dispatch loop talks to these, never to process.stdin/stdout
 */

export interface IPrompt {
  /**
   * Ask a question and wait for one line of input
   * @returns The trimmed answer, or null once input has ended
   */
  ask(question: string): Promise<string | null>;
  close(): void;
}

export interface IOutput {
  print(line?: string): void;
}

import * as readline from 'readline';
import { IOutput, IPrompt } from './ports';

/**
 * Prompt backed by Node's readline
 *
 * Lines are queued as readline emits them, so a piped script that arrives in
 * a single chunk is answered one line per question.
 * Once input has ended and the queue is drained, every answer is null.
 */
export class ReadlinePrompt implements IPrompt {
  private rl: readline.Interface;
  private closed = false;
  private lines: string[] = [];
  private waiting: ((answer: string | null) => void) | null = null;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = readline.createInterface({ input, output });
    this.rl.on('line', (line) => this.receive(line.trim()));
    this.rl.on('close', () => {
      this.closed = true;
      this.settle(null);
    });
  }

  ask(question: string): Promise<string | null> {
    if (!this.closed) {
      this.rl.setPrompt(question);
      this.rl.prompt();
    }

    const queued = this.lines.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  close(): void {
    this.rl.close();
  }

  private receive(line: string): void {
    if (this.waiting) {
      this.settle(line);
    } else {
      this.lines.push(line);
    }
  }

  private settle(answer: string | null): void {
    const resolve = this.waiting;
    this.waiting = null;
    resolve?.(answer);
  }
}

export class ConsoleOutput implements IOutput {
  constructor(private stream: NodeJS.WritableStream = process.stdout) {}

  print(line = ''): void {
    this.stream.write(`${line}\n`);
  }
}

import * as readline from 'readline';

export const TERMINAL = Symbol('TERMINAL');

export interface Terminal {
  // Resolves with null once input has ended
  ask(question: string): Promise<string | null>;
  print(line: string): void;
  close(): void;
}

export class ReadlineTerminal implements Terminal {
  private readonly rl: readline.Interface;
  // Lines that arrived before anyone asked for them, e.g. piped input
  private readonly queued: string[] = [];
  private closed = false;
  private waiting?: (answer: string | null) => void;

  constructor(input: NodeJS.ReadableStream = process.stdin,
              private readonly output: NodeJS.WritableStream = process.stdout) {
    this.rl = readline.createInterface({ input, output });
    this.rl.on('line', line => {
      const resolve = this.waiting;
      if (resolve) {
        this.waiting = undefined;
        resolve(line);
      } else {
        this.queued.push(line);
      }
    });
    this.rl.on('close', () => {
      this.closed = true;
      const resolve = this.waiting;
      this.waiting = undefined;
      resolve?.(null);
    });
  }

  ask(question: string): Promise<string | null> {
    if (this.closed) {
      this.output.write(question);
    } else {
      this.rl.setPrompt(question);
      this.rl.prompt();
    }

    const line = this.queued.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise(resolve => {
      this.waiting = resolve;
    });
  }

  print(line: string): void {
    this.output.write(`${line}\n`);
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}

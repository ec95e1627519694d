import { createInterface, type Interface } from "readline/promises";

export interface ConsoleIO {
  ask(question: string): Promise<string>;
  print(line: string): void;
}

export class ReadlineConsoleIO implements ConsoleIO {
  private readonly rl: Interface;

  constructor(input: NodeJS.ReadableStream = process.stdin, private readonly output: NodeJS.WritableStream = process.stdout) {
    this.rl = createInterface({ input, output });
  }

  ask(question: string): Promise<string> {
    return this.rl.question(question);
  }

  print(line: string): void {
    this.output.write(`${line}\n`);
  }

  close(): void {
    this.rl.close();
  }
}

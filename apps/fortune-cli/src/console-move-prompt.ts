import type { MoveContext, MovePrompt } from "@fortune/game-math-fortune";
import { renderMoveContext } from "./board";
import type { ConsoleIO } from "./console-io";

export const MOVE_QUESTION = 'Guess a letter, the phrase, or type "exit" or "pass": ';

export class ConsoleMovePrompt implements MovePrompt {
  constructor(private readonly io: ConsoleIO) {}

  async requestMove(context: MoveContext): Promise<string> {
    this.io.print(renderMoveContext(context));
    const answer = await this.io.ask(MOVE_QUESTION);
    return answer.toUpperCase();
  }

  rejectMove(_context: MoveContext, _move: string, reason: string): void {
    this.io.print(`Invalid move! ${reason}`);
  }
}

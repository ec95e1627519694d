import { setTimeout as sleep } from "timers/promises";
import type { GameListener, GameState, Player, TurnReport, WheelSegment } from "@fortune/game-math-fortune";
import type { ConsoleIO } from "./console-io";

export class ConsoleGameListener implements GameListener {
  constructor(private readonly io: ConsoleIO, private readonly spinDelayMs = 0) {}

  async onSpin(player: Player, segment: WheelSegment, _state: GameState): Promise<void> {
    this.io.print(`\n${player.name} (${player.money}) spins...`);
    await this.pause(this.spinDelayMs);
    this.io.print(segment.text);
    await this.pause(Math.floor(this.spinDelayMs / 2));
  }

  onTurnEnd(report: TurnReport, _state: GameState): void {
    const name = report.player.name;
    const event = report.event;
    switch (event.type) {
      case "BANKRUPT":
        this.io.print(`${name} goes bankrupt!`);
        break;
      case "LOSE_TURN":
        this.io.print(`${name} loses a turn.`);
        break;
      case "PASS":
        this.io.print(`${name} passes.`);
        break;
      case "GUESS_LETTER":
        if (report.player.kind === "computer") {
          this.io.print(`${name} guesses ${event.letter}.`);
        }
        this.io.print(describeLetter(event.letter, event.occurrences, event.award, event.prize));
        break;
      case "GUESS_PHRASE":
        if (!event.correct) {
          this.io.print(`${event.text} is not the phrase.`);
        }
        break;
      case "EXIT":
        break;
    }
  }

  private async pause(ms: number): Promise<void> {
    if (ms > 0) {
      await sleep(ms);
    }
  }
}

export function describeLetter(letter: string, occurrences: number, award: number, prize?: string): string {
  if (occurrences === 0) {
    return `There is no ${letter}.`;
  }
  const count = occurrences === 1 ? `There is one ${letter}` : `There are ${occurrences} of ${letter}`;
  const winnings = [award > 0 ? `${award}` : "", prize ?? ""].filter(Boolean).join(" and ");
  return winnings ? `${count}, worth ${winnings}.` : `${count}.`;
}

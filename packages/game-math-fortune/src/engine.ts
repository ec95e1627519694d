import { assertValidPhrase, assertValidWheel } from "@fortune/core-data";
import { ConfigurationError, InvalidMoveError, InvalidPhraseDataError } from "@fortune/core-errors";
import { type ILogger, NoopLogger } from "@fortune/core-logging";
import type { IRandomSource } from "@fortune/core-rng";
import type { GameStatus } from "@fortune/core-types";
import { validateMove } from "./moves";
import { countOccurrences, isSolved, obscure, pickCategoryAndPhrase } from "./phrase";
import { addMoney, addPrize, decideMove, goBankrupt } from "./player";
import { eligibleLetters } from "./policy";
import type {
  Action,
  CategoryAndPhrase,
  GameListener,
  GameOutcome,
  GameState,
  MoveContext,
  PhraseCatalog,
  Player,
  TurnEvent,
  TurnReport,
  Wheel,
  WheelSegment,
} from "./types";
import { spin } from "./wheel";

export interface FortuneRules {
  /** Credit segment value for every occurrence of a correctly guessed letter. */
  awardCash: boolean;
  /** Add the segment's prize label to the player on a correct letter. */
  awardPrizes: boolean;
}

export const DEFAULT_RULES: FortuneRules = {
  awardCash: true,
  awardPrizes: true,
};

export interface FortuneEngineOptions {
  wheel: Wheel;
  players: readonly Player[];
  rng: IRandomSource;
  /** Source of the secret phrase; ignored when `puzzle` is given. */
  catalog?: PhraseCatalog;
  puzzle?: CategoryAndPhrase;
  rules?: Partial<FortuneRules>;
  /** Ends the game without a winner after this many turns. */
  maxTurns?: number;
  logger?: ILogger;
  listener?: GameListener;
}

interface EngineState extends GameState {
  readonly guessedLetters: Set<string>;
  currentPlayerIndex: number;
  winner?: Player;
  status: GameStatus;
  turn: number;
}

interface RequestedAction {
  action: Action;
  rejectedMoves: number;
}

export class FortuneEngine {
  private readonly wheel: Wheel;
  private readonly rng: IRandomSource;
  private readonly rules: FortuneRules;
  private readonly maxTurns?: number;
  private readonly logger: ILogger;
  private readonly listener?: GameListener;
  private readonly game: EngineState;

  constructor(options: FortuneEngineOptions) {
    if (options.players.length === 0) {
      throw new ConfigurationError("At least one player is required");
    }
    assertValidWheel(options.wheel);
    if (options.maxTurns != null && (!Number.isInteger(options.maxTurns) || options.maxTurns <= 0)) {
      throw new ConfigurationError("maxTurns must be a positive integer", { maxTurns: options.maxTurns });
    }

    this.wheel = options.wheel;
    this.rng = options.rng;
    this.rules = { ...DEFAULT_RULES, ...options.rules };
    this.maxTurns = options.maxTurns;
    this.logger = options.logger ?? new NoopLogger();
    this.listener = options.listener;

    const { category, phrase } = this.selectPuzzle(options);
    this.game = {
      category,
      phrase,
      guessedLetters: new Set(),
      players: [...options.players],
      currentPlayerIndex: 0,
      status: "IN_PROGRESS",
      turn: 0,
    };
    this.logger.info("game.started", { category, players: this.game.players.map((p) => p.name) });
  }

  get state(): GameState {
    return this.game;
  }

  get currentPlayer(): Player {
    return this.game.players[this.game.currentPlayerIndex];
  }

  get isOver(): boolean {
    return this.game.status !== "IN_PROGRESS";
  }

  obscuredPhrase(): string {
    return obscure(this.game.phrase, this.game.guessedLetters);
  }

  outcome(): GameOutcome {
    return {
      category: this.game.category,
      phrase: this.game.phrase,
      winner: this.game.winner,
      status: this.game.status,
      turns: this.game.turn,
    };
  }

  async run(): Promise<GameOutcome> {
    while (!this.isOver) {
      await this.playTurn();
    }
    return this.outcome();
  }

  async playTurn(): Promise<TurnReport> {
    if (this.isOver) {
      throw new Error("Fortune: game is already over");
    }

    const player = this.currentPlayer;
    this.game.turn += 1;

    const segment = spin(this.wheel, this.rng);
    this.logger.info("turn.spin", { turn: this.game.turn, player: player.name, segment: segment.text, kind: segment.kind });
    await this.listener?.onSpin?.(player, segment, this.game);

    const { event, rejectedMoves } = await this.resolveSegment(player, segment);

    if (!this.isOver) {
      if (this.isStalemate()) {
        this.game.status = "STALEMATE";
      } else if (this.maxTurns != null && this.game.turn >= this.maxTurns) {
        this.game.status = "TURN_LIMIT";
      } else {
        this.game.currentPlayerIndex = (this.game.currentPlayerIndex + 1) % this.game.players.length;
      }
    }

    if (this.isOver) {
      this.logger.info("game.over", { status: this.game.status, winner: this.game.winner?.name, turns: this.game.turn });
    }

    const report: TurnReport = {
      turn: this.game.turn,
      player,
      segment,
      event,
      rejectedMoves,
      status: this.game.status,
    };
    await this.listener?.onTurnEnd?.(report, this.game);
    return report;
  }

  private async resolveSegment(player: Player, segment: WheelSegment): Promise<{ event: TurnEvent; rejectedMoves: number }> {
    switch (segment.kind) {
      case "BANKRUPT": {
        const moneyLost = player.money;
        goBankrupt(player);
        this.logger.info("turn.bankrupt", { turn: this.game.turn, player: player.name, moneyLost });
        return { event: { type: "BANKRUPT", moneyLost }, rejectedMoves: 0 };
      }
      case "LOSE_TURN":
        return { event: { type: "LOSE_TURN" }, rejectedMoves: 0 };
      case "CASH": {
        const requested = await this.requestAction(player);
        return { event: this.applyAction(player, segment, requested.action), rejectedMoves: requested.rejectedMoves };
      }
    }
  }

  private selectPuzzle(options: FortuneEngineOptions): CategoryAndPhrase {
    if (options.puzzle) {
      const phrase = options.puzzle.phrase.trim().toUpperCase();
      assertValidPhrase(phrase, { category: options.puzzle.category });
      return { category: options.puzzle.category, phrase };
    }
    if (!options.catalog) {
      throw new InvalidPhraseDataError("Phrases: a catalog or a puzzle is required");
    }
    return pickCategoryAndPhrase(options.catalog, this.rng);
  }

  /** No human left to exit and no computer with a letter it may guess. */
  private isStalemate(): boolean {
    return this.game.players.every(
      (player) => player.kind === "computer" && eligibleLetters(this.game.guessedLetters, player.money).length === 0,
    );
  }

  private moveContext(player: Player): MoveContext {
    return {
      category: this.game.category,
      obscuredPhrase: this.obscuredPhrase(),
      guessedLetters: new Set(this.game.guessedLetters),
      playerName: player.name,
      playerMoney: player.money,
    };
  }

  private async requestAction(player: Player): Promise<RequestedAction> {
    let rejectedMoves = 0;
    for (;;) {
      const context = this.moveContext(player);
      const raw = await decideMove(player, context, this.rng);
      try {
        return { action: validateMove(raw, this.game.guessedLetters, player.money), rejectedMoves };
      } catch (err) {
        if (!(err instanceof InvalidMoveError)) {
          throw err;
        }
        rejectedMoves += 1;
        this.logger.info("move.rejected", { player: player.name, move: raw, reason: err.reason });
        if (player.kind === "human") {
          await player.prompt.rejectMove?.(context, raw, err.message);
        }
      }
    }
  }

  private applyAction(player: Player, segment: WheelSegment, action: Action): TurnEvent {
    switch (action.type) {
      case "EXIT":
        this.game.status = "EXITED";
        return { type: "EXIT" };
      case "PASS":
        return { type: "PASS" };
      case "GUESS_LETTER":
        return this.applyLetter(player, segment, action.letter);
      case "GUESS_PHRASE": {
        const correct = action.text === this.game.phrase;
        if (correct) {
          this.declareWinner(player);
        }
        return { type: "GUESS_PHRASE", text: action.text, correct };
      }
    }
  }

  private applyLetter(player: Player, segment: WheelSegment, letter: string): TurnEvent {
    this.game.guessedLetters.add(letter);
    const occurrences = countOccurrences(this.game.phrase, letter);
    const award = this.rules.awardCash ? segment.value * occurrences : 0;
    if (award > 0) {
      addMoney(player, award);
    }
    const prize = this.rules.awardPrizes && occurrences > 0 && segment.prizeLabel ? segment.prizeLabel : undefined;
    if (prize) {
      addPrize(player, prize);
    }

    const solved = isSolved(this.game.phrase, this.game.guessedLetters);
    if (solved) {
      this.declareWinner(player);
    }
    return { type: "GUESS_LETTER", letter, occurrences, award, prize, solved };
  }

  private declareWinner(player: Player): void {
    this.game.winner = player;
    this.game.status = "SOLVED";
  }
}

export function createGame(options: FortuneEngineOptions): FortuneEngine {
  return new FortuneEngine(options);
}

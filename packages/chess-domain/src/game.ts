import { Board } from "./board";
import { formatSquare } from "./coordinates";
import { toFen } from "./fen";
import { opponentOf } from "./pieces";
import { Color, MoveRecord, Square } from "./types";

export type GameOptions = {
  board?: Board;
  turn?: Color;
};

export class Game {
  readonly board: Board;
  private currentTurn: Color;
  private readonly moves: MoveRecord[] = [];
  private isRunning = true;

  constructor(options: GameOptions = {}) {
    this.board = options.board ?? new Board();
    this.currentTurn = options.turn ?? "w";
  }

  get turn(): Color {
    return this.currentTurn;
  }

  get running(): boolean {
    return this.isRunning;
  }

  get history(): readonly MoveRecord[] {
    return this.moves;
  }

  switchTurn(): void {
    this.currentTurn = opponentOf(this.currentTurn);
  }

  /**
   * Plays a move for the side to move. Rejections (vacant source, wrong
   * side, illegal destination) all return false with no state change.
   */
  applyMove(from: Square, to: Square): boolean {
    const piece = this.board.at(from);
    if (!piece || piece.color !== this.currentTurn) {
      return false;
    }
    if (!this.board.move(from, to)) {
      return false;
    }
    this.moves.push(Object.freeze({ from: formatSquare(from), to: formatSquare(to) }));
    this.switchTurn();
    return true;
  }

  legalMovesFrom(square: Square): Square[] {
    return this.board.legalMovesFrom(square);
  }

  quit(): void {
    this.isRunning = false;
  }

  fen(): string {
    return toFen(this.board, this.currentTurn, Math.floor(this.moves.length / 2) + 1);
  }
}

import { BOARD_SIZE, sameSquare } from "./coordinates";
import { promotionRow, pseudoLegalMoves } from "./pieces";
import { BoardView, Cell, Piece, PieceKind, Square } from "./types";

const BACK_RANK: readonly PieceKind[] = [
  "rook",
  "knight",
  "bishop",
  "queen",
  "king",
  "bishop",
  "knight",
  "rook"
];

export type OccupiedSquare = {
  square: Square;
  piece: Piece;
};

function emptyCells(): Cell[][] {
  return Array.from({ length: BOARD_SIZE }, () => Array<Cell>(BOARD_SIZE).fill(null));
}

function startingCells(): Cell[][] {
  const cells = emptyCells();
  BACK_RANK.forEach((kind, col) => {
    setCell(cells, { row: 0, col }, { kind, color: "b" });
    setCell(cells, { row: 1, col }, { kind: "pawn", color: "b" });
    setCell(cells, { row: 6, col }, { kind: "pawn", color: "w" });
    setCell(cells, { row: 7, col }, { kind, color: "w" });
  });
  return cells;
}

function setCell(cells: Cell[][], square: Square, cell: Cell): void {
  const row = cells[square.row];
  if (!row) {
    throw new RangeError(`Row out of range: ${square.row}`);
  }
  row[square.col] = cell;
}

export class Board implements BoardView {
  readonly size = BOARD_SIZE;
  private readonly cells: Cell[][];

  /** Standard starting position. */
  constructor() {
    this.cells = startingCells();
  }

  static empty(): Board {
    return Board.fromCells(emptyCells());
  }

  /** Builds a board from a row-major grid; the grid is copied. */
  static fromCells(cells: readonly (readonly Cell[])[]): Board {
    if (cells.length !== BOARD_SIZE || cells.some((row) => row.length !== BOARD_SIZE)) {
      throw new RangeError(`Board must be ${BOARD_SIZE}x${BOARD_SIZE}`);
    }
    const board = new Board();
    cells.forEach((row, rowIndex) => {
      row.forEach((cell, col) => setCell(board.cells, { row: rowIndex, col }, cell));
    });
    return board;
  }

  at(square: Square): Cell {
    return this.cells[square.row]?.[square.col] ?? null;
  }

  legalMovesFrom(square: Square): Square[] {
    const piece = this.at(square);
    return piece ? pseudoLegalMoves(piece, this, square) : [];
  }

  /**
   * Moves the piece on `from` to `to`, capturing whatever stands there.
   * Returns false and leaves the board untouched when the move is illegal.
   */
  move(from: Square, to: Square): boolean {
    const piece = this.at(from);
    if (!piece) {
      return false;
    }
    const target = this.at(to);
    if (target && target.color === piece.color) {
      return false;
    }
    if (!pseudoLegalMoves(piece, this, from).some((square) => sameSquare(square, to))) {
      return false;
    }

    const promotes = piece.kind === "pawn" && to.row === promotionRow(piece.color);
    setCell(this.cells, to, promotes ? { kind: "queen", color: piece.color } : piece);
    setCell(this.cells, from, null);
    return true;
  }

  pieces(): OccupiedSquare[] {
    const occupied: OccupiedSquare[] = [];
    this.cells.forEach((row, rowIndex) => {
      row.forEach((piece, col) => {
        if (piece) {
          occupied.push({ square: { row: rowIndex, col }, piece });
        }
      });
    });
    return occupied;
  }
}

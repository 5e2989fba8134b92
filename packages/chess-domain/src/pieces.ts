import { isInBounds } from "./coordinates";
import { BoardView, Color, Piece, Square } from "./types";

type Direction = readonly [number, number];

const ORTHOGONAL: readonly Direction[] = [
  [-1, 0],
  [1, 0],
  [0, -1],
  [0, 1]
];

const DIAGONAL: readonly Direction[] = [
  [-1, -1],
  [-1, 1],
  [1, -1],
  [1, 1]
];

const ALL_DIRECTIONS: readonly Direction[] = [...ORTHOGONAL, ...DIAGONAL];

const KNIGHT_OFFSETS: readonly Direction[] = [
  [-2, -1],
  [-2, 1],
  [-1, -2],
  [-1, 2],
  [1, -2],
  [1, 2],
  [2, -1],
  [2, 1]
];

export function opponentOf(color: Color): Color {
  return color === "w" ? "b" : "w";
}

export function pawnDirection(color: Color): number {
  return color === "w" ? -1 : 1;
}

export function pawnStartRow(color: Color): number {
  return color === "w" ? 6 : 1;
}

/** Row a pawn of this color promotes on. */
export function promotionRow(color: Color): number {
  return color === "w" ? 0 : 7;
}

/**
 * Destinations the piece on `from` may reach by its movement pattern alone.
 * Whether the move leaves the mover's king attacked is not considered.
 */
export function pseudoLegalMoves(piece: Piece, board: BoardView, from: Square): Square[] {
  switch (piece.kind) {
    case "king":
      return stepMoves(piece.color, board, from, ALL_DIRECTIONS);
    case "queen":
      return slidingMoves(piece.color, board, from, ALL_DIRECTIONS);
    case "rook":
      return slidingMoves(piece.color, board, from, ORTHOGONAL);
    case "bishop":
      return slidingMoves(piece.color, board, from, DIAGONAL);
    case "knight":
      return stepMoves(piece.color, board, from, KNIGHT_OFFSETS);
    case "pawn":
      return pawnMoves(piece.color, board, from);
    default: {
      const unreachable: never = piece.kind;
      return unreachable;
    }
  }
}

function slidingMoves(
  color: Color,
  board: BoardView,
  from: Square,
  directions: readonly Direction[]
): Square[] {
  const moves: Square[] = [];
  for (const [dr, dc] of directions) {
    let row = from.row + dr;
    let col = from.col + dc;
    while (isInBounds(row, col)) {
      const target = board.at({ row, col });
      if (target) {
        if (target.color !== color) {
          moves.push({ row, col });
        }
        break;
      }
      moves.push({ row, col });
      row += dr;
      col += dc;
    }
  }
  return moves;
}

function stepMoves(
  color: Color,
  board: BoardView,
  from: Square,
  offsets: readonly Direction[]
): Square[] {
  const moves: Square[] = [];
  for (const [dr, dc] of offsets) {
    const row = from.row + dr;
    const col = from.col + dc;
    if (!isInBounds(row, col)) {
      continue;
    }
    const target = board.at({ row, col });
    if (!target || target.color !== color) {
      moves.push({ row, col });
    }
  }
  return moves;
}

function pawnMoves(color: Color, board: BoardView, from: Square): Square[] {
  const moves: Square[] = [];
  const direction = pawnDirection(color);
  const oneRow = from.row + direction;

  if (isInBounds(oneRow, from.col) && !board.at({ row: oneRow, col: from.col })) {
    moves.push({ row: oneRow, col: from.col });
    const twoRow = from.row + 2 * direction;
    if (
      from.row === pawnStartRow(color) &&
      isInBounds(twoRow, from.col) &&
      !board.at({ row: twoRow, col: from.col })
    ) {
      moves.push({ row: twoRow, col: from.col });
    }
  }

  for (const dc of [-1, 1]) {
    const col = from.col + dc;
    if (!isInBounds(oneRow, col)) {
      continue;
    }
    const target = board.at({ row: oneRow, col });
    if (target && target.color !== color) {
      moves.push({ row: oneRow, col });
    }
  }
  return moves;
}

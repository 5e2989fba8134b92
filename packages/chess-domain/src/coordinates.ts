import { File, Rank, Square, SquareName } from "./types";

export const BOARD_SIZE = 8;

const FILES: readonly File[] = ["a", "b", "c", "d", "e", "f", "g", "h"];
const RANKS: readonly Rank[] = ["1", "2", "3", "4", "5", "6", "7", "8"];

export function isInBounds(row: number, col: number): boolean {
  return row >= 0 && row < BOARD_SIZE && col >= 0 && col < BOARD_SIZE;
}

/**
 * Parses an algebraic square such as "e4" (case-insensitive, surrounding
 * whitespace ignored). Returns null for anything else.
 */
export function parseSquare(text: string): Square | null {
  const normalized = text.trim().toLowerCase();
  if (normalized.length !== 2) {
    return null;
  }
  const col = FILES.findIndex((file) => file === normalized[0]);
  const rankIndex = RANKS.findIndex((rank) => rank === normalized[1]);
  if (col < 0 || rankIndex < 0) {
    return null;
  }
  return { row: BOARD_SIZE - 1 - rankIndex, col };
}

export function formatSquare(square: Square): SquareName {
  const file = FILES[square.col];
  const rank = RANKS[BOARD_SIZE - 1 - square.row];
  if (!file || !rank) {
    throw new RangeError(`Square out of range: ${square.row},${square.col}`);
  }
  return `${file}${rank}`;
}

export function sameSquare(a: Square, b: Square): boolean {
  return a.row === b.row && a.col === b.col;
}

import { Board } from "./board";
import { BOARD_SIZE } from "./coordinates";
import { Cell, Color, Piece, PieceKind } from "./types";

export type FenParts = {
  placement: string;
  turn: Color;
  castling: string;
  enPassant: string;
  halfmoveClock: number;
  fullmoveNumber: number;
};

const KIND_TO_LETTER: Record<PieceKind, string> = {
  king: "k",
  queen: "q",
  rook: "r",
  bishop: "b",
  knight: "n",
  pawn: "p"
};

const LETTER_TO_KIND: Record<string, PieceKind> = {
  k: "king",
  q: "queen",
  r: "rook",
  b: "bishop",
  n: "knight",
  p: "pawn"
};

export function parseFen(fen: string): FenParts {
  const [placement, turn, castling, enPassant, halfmoveClock, fullmoveNumber] = fen.trim().split(/\s+/);
  if (!placement || (turn !== "w" && turn !== "b")) {
    throw new Error("Invalid FEN");
  }
  return {
    placement,
    turn,
    castling: castling ?? "-",
    enPassant: enPassant ?? "-",
    halfmoveClock: Number(halfmoveClock ?? 0),
    fullmoveNumber: Number(fullmoveNumber ?? 1)
  };
}

export function pieceToLetter(piece: Piece): string {
  const letter = KIND_TO_LETTER[piece.kind];
  return piece.color === "w" ? letter.toUpperCase() : letter;
}

export function placementFromBoard(board: Board): string {
  const ranks: string[] = [];
  for (let row = 0; row < BOARD_SIZE; row++) {
    let rank = "";
    let empty = 0;
    for (let col = 0; col < BOARD_SIZE; col++) {
      const piece = board.at({ row, col });
      if (!piece) {
        empty++;
        continue;
      }
      if (empty > 0) {
        rank += String(empty);
        empty = 0;
      }
      rank += pieceToLetter(piece);
    }
    if (empty > 0) {
      rank += String(empty);
    }
    ranks.push(rank);
  }
  return ranks.join("/");
}

export function boardFromPlacement(placement: string): Board {
  const ranks = placement.split("/");
  if (ranks.length !== BOARD_SIZE) {
    throw new Error("Invalid FEN placement");
  }
  const cells = ranks.map((rank) => {
    const row: Cell[] = [];
    for (const char of rank) {
      if (/[1-8]/.test(char)) {
        row.push(...Array<Cell>(Number(char)).fill(null));
        continue;
      }
      const kind = LETTER_TO_KIND[char.toLowerCase()];
      if (!kind) {
        throw new Error("Invalid FEN placement");
      }
      row.push({ kind, color: char === char.toUpperCase() ? "w" : "b" });
    }
    if (row.length !== BOARD_SIZE) {
      throw new Error("Invalid FEN placement");
    }
    return row;
  });
  return Board.fromCells(cells);
}

/**
 * Castling rights and en passant targets are not tracked, so both fields
 * are always "-".
 */
export function toFen(board: Board, turn: Color, fullmoveNumber = 1): string {
  return `${placementFromBoard(board)} ${turn} - - 0 ${fullmoveNumber}`;
}

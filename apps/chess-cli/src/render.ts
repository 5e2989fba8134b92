import { BoardView, Color, PieceKind } from "@boardline/chess-domain";

import { GlyphSet } from "./config";

type GlyphTable = Record<Color, Record<PieceKind, string>>;

const GLYPHS: Record<GlyphSet, GlyphTable> = {
  unicode: {
    w: { king: "♔", queen: "♕", rook: "♖", bishop: "♗", knight: "♘", pawn: "♙" },
    b: { king: "♚", queen: "♛", rook: "♜", bishop: "♝", knight: "♞", pawn: "♟" }
  },
  ascii: {
    w: { king: "K", queen: "Q", rook: "R", bishop: "B", knight: "N", pawn: "P" },
    b: { king: "k", queen: "q", rook: "r", bishop: "b", knight: "n", pawn: "p" }
  }
};

const FILE_LABELS = ["a", "b", "c", "d", "e", "f", "g", "h"];

export function glyphFor(kind: PieceKind, color: Color, glyphs: GlyphSet): string {
  return GLYPHS[glyphs][color][kind];
}

export function renderBoard(board: BoardView, glyphs: GlyphSet = "unicode"): string {
  const separator = "  +" + "---+".repeat(board.size);
  const lines: string[] = [];
  for (let row = 0; row < board.size; row++) {
    lines.push(separator);
    const cells: string[] = [];
    for (let col = 0; col < board.size; col++) {
      const piece = board.at({ row, col });
      cells.push(piece ? glyphFor(piece.kind, piece.color, glyphs) : " ");
    }
    lines.push(`${board.size - row} | ${cells.join(" | ")} |`);
  }
  lines.push(separator);
  lines.push("    " + FILE_LABELS.slice(0, board.size).join("   "));
  return lines.join("\n");
}

import { describe, expect, it } from "vitest";

import { Board } from "./board";
import { parseSquare } from "./coordinates";
import { boardFromPlacement, placementFromBoard } from "./fen";
import { Cell, PieceKind, Square } from "./types";

function sq(name: string): Square {
  const square = parseSquare(name);
  if (!square) {
    throw new Error(`Bad square in test: ${name}`);
  }
  return square;
}

describe("Board", () => {
  describe("starting position", () => {
    const board = new Board();
    const backRank: PieceKind[] = ["rook", "knight", "bishop", "queen", "king", "bishop", "knight", "rook"];

    it("has sixteen pieces per side", () => {
      const pieces = board.pieces();
      expect(pieces.filter(({ piece }) => piece.color === "w")).toHaveLength(16);
      expect(pieces.filter(({ piece }) => piece.color === "b")).toHaveLength(16);
    });

    it("fills the pawn ranks and back ranks", () => {
      for (let col = 0; col < 8; col++) {
        expect(board.at({ row: 1, col })).toEqual({ kind: "pawn", color: "b" });
        expect(board.at({ row: 6, col })).toEqual({ kind: "pawn", color: "w" });
        expect(board.at({ row: 0, col })).toEqual({ kind: backRank[col], color: "b" });
        expect(board.at({ row: 7, col })).toEqual({ kind: backRank[col], color: "w" });
      }
    });

    it("leaves rows 2 to 5 empty", () => {
      for (let row = 2; row <= 5; row++) {
        for (let col = 0; col < 8; col++) {
          expect(board.at({ row, col })).toBeNull();
        }
      }
    });

    it("is 8 squares wide", () => {
      expect(board.size).toBe(8);
    });
  });

  describe("move", () => {
    it("relocates a piece along a legal path", () => {
      const board = new Board();
      expect(board.move(sq("g1"), sq("f3"))).toBe(true);
      expect(board.at(sq("g1"))).toBeNull();
      expect(board.at(sq("f3"))).toEqual({ kind: "knight", color: "w" });
    });

    it("refuses to capture a friendly piece and leaves the board unchanged", () => {
      const board = new Board();
      const before = placementFromBoard(board);
      expect(board.move(sq("a1"), sq("a2"))).toBe(false);
      expect(board.move(sq("d8"), sq("e8"))).toBe(false);
      expect(placementFromBoard(board)).toBe(before);
    });

    it("fails on a vacant source", () => {
      const board = new Board();
      expect(board.move(sq("e4"), sq("e5"))).toBe(false);
    });

    it("fails when the destination is outside the piece's moves", () => {
      const board = new Board();
      const before = placementFromBoard(board);
      expect(board.move(sq("e2"), sq("e5"))).toBe(false);
      expect(board.move(sq("f1"), sq("c4"))).toBe(false);
      expect(placementFromBoard(board)).toBe(before);
    });

    it("removes a captured piece", () => {
      const board = boardFromPlacement("8/8/8/3p4/4P3/8/8/8");
      expect(board.move(sq("e4"), sq("d5"))).toBe(true);
      expect(board.at(sq("d5"))).toEqual({ kind: "pawn", color: "w" });
      expect(board.at(sq("e4"))).toBeNull();
      expect(board.pieces()).toHaveLength(1);
    });

    it("promotes a white pawn reaching the eighth rank", () => {
      const board = boardFromPlacement("8/P7/8/8/8/8/8/8");
      expect(board.move(sq("a7"), sq("a8"))).toBe(true);
      expect(board.at(sq("a8"))).toEqual({ kind: "queen", color: "w" });
      expect(board.at(sq("a7"))).toBeNull();
    });

    it("promotes a black pawn capturing onto the first rank", () => {
      const board = boardFromPlacement("8/8/8/8/8/8/1p6/R7");
      expect(board.move(sq("b2"), sq("a1"))).toBe(true);
      expect(board.at(sq("a1"))).toEqual({ kind: "queen", color: "b" });
      expect(board.pieces()).toHaveLength(1);
    });

    it("does not check whose turn it is", () => {
      const board = new Board();
      expect(board.move(sq("e7"), sq("e5"))).toBe(true);
    });
  });

  describe("legalMovesFrom", () => {
    it("is empty for a vacant square", () => {
      expect(new Board().legalMovesFrom(sq("e4"))).toEqual([]);
    });

    it("lists a knight's opening moves", () => {
      expect(new Board().legalMovesFrom(sq("b1"))).toEqual([sq("a3"), sq("c3")]);
    });
  });

  describe("construction", () => {
    it("starts empty from Board.empty", () => {
      expect(Board.empty().pieces()).toEqual([]);
    });

    it("copies the grid passed to fromCells", () => {
      const cells: Cell[][] = Array.from({ length: 8 }, () => Array<Cell>(8).fill(null));
      const board = Board.fromCells(cells);
      cells[0]?.splice(0, 1, { kind: "king", color: "w" });
      expect(board.at({ row: 0, col: 0 })).toBeNull();
    });

    it("rejects a grid of the wrong size", () => {
      expect(() => Board.fromCells([[null]])).toThrow(RangeError);
    });
  });
});

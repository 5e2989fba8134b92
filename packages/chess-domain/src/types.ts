export type Color = "w" | "b";

export type File = "a" | "b" | "c" | "d" | "e" | "f" | "g" | "h";
export type Rank = "1" | "2" | "3" | "4" | "5" | "6" | "7" | "8";
export type SquareName = `${File}${Rank}`;

/** Row 0 is rank 8, column 0 is file a. */
export type Square = {
  row: number;
  col: number;
};

export type PieceKind = "king" | "queen" | "rook" | "bishop" | "knight" | "pawn";

export type Piece = Readonly<{
  kind: PieceKind;
  color: Color;
}>;

export type Cell = Piece | null;

export type MoveRecord = Readonly<{
  from: SquareName;
  to: SquareName;
}>;

/** Read-only access a piece needs to compute its moves. */
export interface BoardView {
  readonly size: number;
  at(square: Square): Cell;
}

import { parseSquare, Square } from "@boardline/chess-domain";

export type Command =
  | { type: "QUIT" }
  | { type: "BOARD" }
  | { type: "HISTORY" }
  | { type: "FEN" }
  | { type: "HELP" }
  | { type: "MOVES"; square: Square }
  | { type: "MOVE"; from: Square; to: Square };

const KEYWORDS = new Map<string, Command>([
  ["quit", { type: "QUIT" }],
  ["exit", { type: "QUIT" }],
  ["board", { type: "BOARD" }],
  ["history", { type: "HISTORY" }],
  ["fen", { type: "FEN" }],
  ["help", { type: "HELP" }]
]);

export const HELP_TEXT = [
  "<from> <to>   move a piece, e.g. e2 e4",
  "moves <sq>    list destinations for the piece on a square",
  "board         print the board",
  "history       list moves played so far",
  "fen           print the position as FEN",
  "quit          leave the game"
];

/** Returns null for anything that is not a well-formed command. */
export function parseCommand(line: string): Command | null {
  const parts = line.trim().split(/\s+/).filter((part) => part.length > 0);
  const [first, second] = parts;
  if (!first) {
    return null;
  }

  const keyword = first.toLowerCase();
  if (parts.length === 1) {
    return KEYWORDS.get(keyword) ?? null;
  }
  if (parts.length !== 2 || !second) {
    return null;
  }

  if (keyword === "moves") {
    const square = parseSquare(second);
    return square ? { type: "MOVES", square } : null;
  }

  const from = parseSquare(first);
  const to = parseSquare(second);
  return from && to ? { type: "MOVE", from, to } : null;
}

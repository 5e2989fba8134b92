import { Color, formatSquare, Game } from "@boardline/chess-domain";

import { Command, HELP_TEXT } from "./commands";
import { GlyphSet } from "./config";
import { Logger } from "./logger";
import { renderBoard } from "./render";

export type SessionOptions = {
  glyphs: GlyphSet;
  logger: Logger;
};

export function promptFor(turn: Color): string {
  return turn === "w" ? "White >> " : "Black >> ";
}

/**
 * Runs one command against the game and returns the lines to print.
 * A rejected move prints nothing.
 */
export function runCommand(game: Game, command: Command, options: SessionOptions): string[] {
  switch (command.type) {
    case "QUIT":
      game.quit();
      return [];
    case "BOARD":
      return [renderBoard(game.board, options.glyphs)];
    case "HISTORY":
      return game.history.map((entry) => `${entry.from} -> ${entry.to}`);
    case "FEN":
      return [game.fen()];
    case "HELP":
      return [...HELP_TEXT];
    case "MOVES":
      return [game.legalMovesFrom(command.square).map(formatSquare).join(", ")];
    case "MOVE": {
      const from = formatSquare(command.from);
      const to = formatSquare(command.to);
      if (!game.applyMove(command.from, command.to)) {
        options.logger.debug(`rejected ${from} ${to}`);
        return [];
      }
      options.logger.debug(`played ${from} ${to}`);
      return [renderBoard(game.board, options.glyphs)];
    }
    default: {
      const unreachable: never = command;
      return unreachable;
    }
  }
}

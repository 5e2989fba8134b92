import { createInterface } from "node:readline";

import { Game } from "@boardline/chess-domain";

import { parseCommand } from "./commands";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { renderBoard } from "./render";
import { promptFor, runCommand } from "./session";

function main(): void {
  const config = loadConfig();
  const logger = createLogger("ChessCli", config.logLevel);
  const game = new Game();
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  logger.info(`starting with ${config.glyphs} glyphs`);
  console.log(renderBoard(game.board, config.glyphs));
  rl.setPrompt(promptFor(game.turn));
  rl.prompt();

  rl.on("line", (line) => {
    const command = parseCommand(line);
    if (!command) {
      logger.debug(`ignored input: ${JSON.stringify(line)}`);
    } else {
      for (const output of runCommand(game, command, { glyphs: config.glyphs, logger })) {
        console.log(output);
      }
    }
    if (!game.running) {
      rl.close();
      return;
    }
    rl.setPrompt(promptFor(game.turn));
    rl.prompt();
  });

  rl.on("close", () => {
    logger.info(`session ended after ${game.history.length} moves`);
  });
}

try {
  main();
} catch (error) {
  console.error("[ChessCli] Failed to start:", error);
  process.exitCode = 1;
}

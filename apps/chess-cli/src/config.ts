import { z } from "zod";

export const glyphSetSchema = z.enum(["unicode", "ascii"]);
export const logLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export const cliConfigSchema = z.object({
  glyphs: glyphSetSchema.default("unicode"),
  logLevel: logLevelSchema.default("warn")
});

export type GlyphSet = z.infer<typeof glyphSetSchema>;
export type LogLevel = z.infer<typeof logLevelSchema>;
export type CliConfig = z.infer<typeof cliConfigSchema>;

/** Reads CHESS_GLYPHS and CHESS_LOG_LEVEL; throws a ZodError on bad values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  return cliConfigSchema.parse({
    glyphs: env.CHESS_GLYPHS?.trim().toLowerCase() || undefined,
    logLevel: env.CHESS_LOG_LEVEL?.trim().toLowerCase() || undefined
  });
}

export * from "./types";
export * from "./coordinates";
export * from "./pieces";
export * from "./board";
export * from "./fen";
export * from "./game";

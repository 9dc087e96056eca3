export { generateFeed, runFeed, writeFeedFile, toAtomEntry, GEMTEXT_MIME } from "./feeder.js";
export type { FeederOptions, FeederResult } from "./types.js";

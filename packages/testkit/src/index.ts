export type { Random } from "./random.js";
export { createRandom, randomIntArray, distinctIntArray, shuffle, sampleLengths } from "./random.js";
export type { TimingSummary } from "./timers.js";
export { clock, runGC } from "./timers.js";
export type { CliResult, CliExecOptions, BufferedIo } from "./cli.js";
export { createBufferedIo, runCli, parseJsonOutput } from "./cli.js";
export { createTempDir, removeDir, withTempDir, writeFixture } from "./fs.js";

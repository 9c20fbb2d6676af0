export const VERSION = "1.0.0";

export { BitValue } from "./bitValue/bitValue";
export * from "./errors";
export * from "./types";
export * as bitTools from "./utils/bitTools";
export * as alignment from "./alignment/alignment";
export * as config from "./config";
export * as report from "./cli/report";
export { ConsoleLogger, NoopLogger } from "./utils/logger";
export type { Logger } from "./utils/logger";

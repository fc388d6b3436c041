export type { ILogger } from "./logger";

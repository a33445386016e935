// CHANGE: Central export point for CLI type definitions

export type { CLICommand, CLIOptions } from "./cli.js";

#!/usr/bin/env node
// CHANGE: Delegate execution to the CLI runner only when run as a program.

import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(process.argv[1]).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { dispatch, runDispatchPass } from "./dispatcher.js";
export type { DispatchOptions, PassResult, PassSummary } from "./dispatcher.js";
export { FileStore, MemoryStore, StoreFormatError } from "./store.js";
export type { PublishStore } from "./store.js";
export { loadSettings } from "./config.js";
export type { Settings } from "./config.js";

#!/usr/bin/env node
import { runCli } from "../cli.js";
import { closeLogger } from "../logger.js";

runCli(process.argv.slice(2)).then(async (code) => {
  await closeLogger();
  process.exitCode = code;
});

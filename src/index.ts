#!/usr/bin/env node
import { Cli } from "clipanion";
import { createCli } from "./cli/program.js";

const cli = createCli();
await cli.runExit(process.argv.slice(2), Cli.defaultContext);

#!/usr/bin/env -S node --import tsx

import process from "node:process";

import { runCli } from "../lib/cli.ts";

process.exitCode = await runCli(process.argv.slice(2));

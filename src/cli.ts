#!/usr/bin/env node
/**
 * rxren – rename files using regular expression matching
 */

import { run } from "./main.js";

process.exitCode = run(process.argv.slice(2));

#!/usr/bin/env node
import { exitWith, startCli } from './start.js';

exitWith(startCli(process.argv.slice(2)));

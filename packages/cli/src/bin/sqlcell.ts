#!/usr/bin/env node
import { runCli } from '../lib/program.js';

process.exitCode = await runCli(process.argv);

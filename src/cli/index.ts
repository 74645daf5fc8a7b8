#!/usr/bin/env node
import { run } from './commands';

process.exitCode = run(process.argv.slice(2));

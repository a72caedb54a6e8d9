#!/usr/bin/env node
import { runProgram } from './cli/program.js';

void runProgram(process.argv);

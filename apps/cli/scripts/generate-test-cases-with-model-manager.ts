#!/usr/bin/env tsx
// CLI script: generate test cases, pulling the model first when it is missing
// Usage: npm run generate:managed -- "User registration" --model llama3:latest

import { createProcessIO, installInterruptHandler, runGenerator } from '../src/index.js';

installInterruptHandler();
process.exitCode = await runGenerator('managed', process.argv.slice(2), { io: createProcessIO() });

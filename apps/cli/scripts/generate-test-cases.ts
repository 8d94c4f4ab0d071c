#!/usr/bin/env tsx
// CLI script: generate test cases for a feature description
// Usage: npm run generate -- "User login with email and password" [--format text]

import { createProcessIO, installInterruptHandler, runGenerator } from '../src/index.js';

installInterruptHandler();
process.exitCode = await runGenerator('basic', process.argv.slice(2), { io: createProcessIO() });

#!/usr/bin/env npx tsx
/**
 * Rehab Phase Tracker
 * Entry point - runs the CLI
 *
 * Usage:
 *   npx tsx src/main.ts assess --injury ACL --lsi 92 --pain 1 --rfd 95
 *   npm run rehab -- history --patient P-001
 */

import { runCli } from '@/cli/commands';

process.exitCode = runCli(process.argv.slice(2));

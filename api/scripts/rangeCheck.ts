#!/usr/bin/env node
// scripts/rangeCheck.ts
// Runs the range check on a workbook on disk: tsx api/scripts/rangeCheck.ts <input.xlsx>
import { runRangeCheckCli } from '../src/cli/rangeCheckCli';

runRangeCheckCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    console.error('Range check failed:', e);
    process.exitCode = 1;
  });

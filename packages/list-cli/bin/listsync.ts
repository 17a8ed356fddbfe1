#!/usr/bin/env tsx
import { runListCli } from '../src/index';

runListCli().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  },
);

#!/usr/bin/env tsx
import { runApp } from './App';
import { describeError } from './services/errors';

runApp(process.argv.slice(2), process.env)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(describeError(err));
    process.exit(1);
  });

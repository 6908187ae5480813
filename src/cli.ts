#!/usr/bin/env node
import { program } from './lib/program';

program().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});

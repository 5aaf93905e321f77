#!/usr/bin/env node
import 'dotenv/config';
import { main } from './main';

main().catch((err: unknown) => {
  console.error(`Pipeline failed: ${err instanceof Error ? err.message : String(err)}`);
  if (err instanceof Error && err.cause) console.error(err.cause);
  process.exit(1);
});

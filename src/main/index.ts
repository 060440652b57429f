// Load .env before anything reads process.env
import 'dotenv/config';
import { runCli } from './cli';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[MAIN] Unexpected error:', error);
    process.exitCode = 1;
  });

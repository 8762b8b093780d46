import { config as loadEnv } from 'dotenv';

import { runCli } from './cli';

loadEnv();

async function main() {
  try {
    process.exitCode = await runCli(process.argv.slice(2), process.env);
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error('[neo-orbits] unexpected failure', error);
    process.exitCode = 1;
  }
}

void main();

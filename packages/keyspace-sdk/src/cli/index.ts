#!/usr/bin/env node

import dotenv from 'dotenv';
import { loadKeyspaceConfig } from '../config';
import { ContractOwnerRegistry } from '../ContractOwnerRegistry';
import { createKeyspaceAccount, getPublicClientSingleton } from '../server';
import { CliUsageError, USAGE, parseCliArgs } from './args';
import { runCommand } from './commands';

// Local convenience: pick up a `.env` in the working directory; a no-op when absent.
dotenv.config();

async function main(): Promise<number> {
  const command = parseCliArgs(process.argv.slice(2));
  if (command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  const config = loadKeyspaceConfig(process.env);
  const client = getPublicClientSingleton(config);
  const account = createKeyspaceAccount(config, { client });
  const owners = new ContractOwnerRegistry(config.accountAddress, client);
  return runCommand(command, { account, owners }, console);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof CliUsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
      process.exitCode = 2;
      return;
    }
    console.error(error);
    process.exitCode = 1;
  });

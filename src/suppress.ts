#!/usr/bin/env node
// src/suppress.ts
import path from 'path';
import { SuppressionApi } from './api.js';
import { checkFile, composeRange, deleteFile, purge, retrieveToFile, updateFile, type TimeRange } from './commands.js';
import { loadConfig } from './env.js';
import { parseArgs, usage, type CliArgs } from './cli.js';
import { FatalError, UsageError } from './errors.js';
import { SessionPool } from './pool.js';

async function main(): Promise<void> {
  const prog = path.basename(process.argv[1] ?? 'suppress');
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (e) {
    if (e instanceof UsageError) {
      console.error(`Argument error: ${e.message}`);
      console.log(usage(prog));
      process.exit(1);
    }
    throw e;
  }
  if (args.help) {
    console.log(usage(prog));
    return;
  }

  const config = loadConfig();
  const { cmd, file } = args;
  let range: TimeRange | undefined;
  if (args.fromTime !== undefined && args.toTime !== undefined) {
    range = composeRange(args.fromTime, args.toTime, config.timezone);
  }

  if (cmd === 'check') {
    await checkFile(config, file);
    return;
  }

  const api = new SuppressionApi({ baseUri: config.baseUri, apiKey: config.apiKey, subaccount: config.subaccount });
  await api.probe();
  if (config.subaccount) console.log(`👤 Using subaccount ${config.subaccount}`);

  switch (cmd) {
    case 'retrieve':
      await retrieveToFile(config, file, api, range);
      return;
    case 'update':
      await updateFile(config, file, api);
      return;
    case 'delete':
    case 'purge': {
      const sessions = new SessionPool(config.deleteThreads);
      try {
        if (cmd === 'delete') await deleteFile(config, file, api, sessions);
        else await purge(config, file, api, sessions);
      } finally {
        await sessions.close();
      }
      return;
    }
  }
}

main().catch(e => {
  if (e instanceof FatalError) console.error(`❌ ${e.message}`);
  else if (e instanceof UsageError) console.error(`Argument error: ${e.message}`);
  else console.error('❌ Unexpected failure:', e);
  process.exit(1);
});

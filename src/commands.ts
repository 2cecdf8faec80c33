// src/commands.ts
import { runPipeline } from './accumulator.js';
import { DeleteAction, NoopAction, UpsertAction, type RemoteAction } from './actions.js';
import type { SuppressionApi } from './api.js';
import type { Config } from './env.js';
import { UsageError } from './errors.js';
import { fetchAll, type FetchStats } from './fetcher.js';
import { isFieldName } from './normalizer.js';
import { DeleteExecutor, type SessionPool } from './pool.js';
import { readOutcomes, readWithEncodings } from './reader.js';
import { CsvFileSink } from './sink.js';
import { composeWithZone } from './timezone.js';
import { seconds } from './utils.js';
import type { RunSummary } from './types.js';

export type TimeRange = { from: string; to: string };

export function printSummary(summary: RunSummary, action: RemoteAction, startT: number): void {
  console.log(`\n✅ ${action.name} finished in ${seconds(startT)} seconds:`);
  console.log(`- Addresses checked:     ${summary.checked}`);
  console.log(`- Good recipients:       ${summary.goodRecips}`);
  console.log(`- Invalid recipients:    ${summary.badRecips}`);
  console.log(`- Duplicates skipped:    ${summary.duplicateRecips}`);
  console.log(`- Type/flags good:       ${summary.flagsGood}`);
  console.log(`- Type/flags defaulted:  ${summary.flagsDefaulted}`);
  if (action.name !== 'check') console.log(`- Done on SparkPost:     ${summary.doneRecips}`);
}

async function processFile(config: Config, file: string, action: RemoteAction): Promise<RunSummary> {
  const decoded = await readWithEncodings(file, config.encodings);
  console.log(`🧮 Checking contents of ${file} are well-formed ..`);
  const startT = Date.now();
  const summary = await runPipeline(
    readOutcomes(decoded.text, { type: config.typeDefault, description: config.descriptionDefault }),
    action,
    config.batchSize
  );
  printSummary(summary, action, startT);
  return summary;
}

export function checkFile(config: Config, file: string): Promise<RunSummary> {
  return processFile(config, file, new NoopAction());
}

export function updateFile(config: Config, file: string, api: SuppressionApi): Promise<RunSummary> {
  return processFile(config, file, new UpsertAction(api));
}

export function deleteFile(config: Config, file: string, api: SuppressionApi, sessions: SessionPool): Promise<RunSummary> {
  return processFile(config, file, new DeleteAction(new DeleteExecutor(api, sessions)));
}

/** Validates and composes `YYYY-MM-DDTHH:MM` arguments with the configured zone. */
export function composeRange(fromTime: string, toTime: string, timezone: string): TimeRange {
  const from = composeWithZone(fromTime, timezone);
  if (from === null) throw new UsageError(`unrecognised from_time: ${fromTime}`);
  const to = composeWithZone(toTime, timezone);
  if (to === null) throw new UsageError(`unrecognised to_time: ${toTime}`);
  return { from, to };
}

export async function retrieveToFile(
  config: Config,
  file: string,
  api: SuppressionApi,
  range?: TimeRange
): Promise<FetchStats> {
  if (range) {
    console.log(`📥 Retrieving SparkPost suppression-list entries from ${range.from} to ${range.to} ${config.timezone} to ${file}`);
  } else {
    console.log(`📥 Retrieving SparkPost suppression-list entries (any time-range) to ${file}`);
  }
  console.log(`Properties: ${config.properties.join(', ')}`);

  const sink = await CsvFileSink.open(file, config.properties);
  const startT = Date.now();
  try {
    const stats = await fetchAll(api, sink, { perPage: config.batchSize, ...range });
    console.log(`\n✅ Retrieved ${stats.rows} entries in ${stats.pages} page(s), ${seconds(startT)} seconds -> ${file}`);
    return stats;
  } finally {
    await sink.close();
  }
}

/** Saves the whole list to `file`, then deletes everything that was saved. */
export async function purge(config: Config, file: string, api: SuppressionApi, sessions: SessionPool): Promise<RunSummary> {
  // the saved file is read back as input, so its columns must be ones the reader accepts
  const unknown = config.properties.filter(p => !isFieldName(p));
  if (!config.properties.includes('recipient') || !config.properties.includes('type') || unknown.length) {
    throw new UsageError(`purge needs PROPERTIES with "recipient" and "type" and only input field names${unknown.length ? ` (not: ${unknown.join(', ')})` : ''}`);
  }
  console.log(`🧹 Purging suppression list entries into ${file}`);
  await retrieveToFile(config, file, api);
  return deleteFile(config, file, api, sessions);
}

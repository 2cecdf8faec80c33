import { once } from 'events';
import fs from 'fs';
import path from 'path';
import { finished } from 'stream/promises';
import { FatalError } from './errors.js';
import { csvLine } from './utils.js';
import type { RemoteEntry } from './types.js';

export interface EntrySink {
  write(entry: RemoteEntry): void | Promise<void>;
}

/** Projects an entry onto the configured columns; unknown fields are dropped. */
export function project(entry: RemoteEntry, properties: string[]): unknown[] {
  return properties.map(p => entry[p]);
}

export class CsvFileSink implements EntrySink {
  private readonly out: fs.WriteStream;
  private failure: Error | null = null;
  rows = 0;

  private constructor(out: fs.WriteStream, private readonly properties: string[]) {
    this.out = out;
    this.out.on('error', e => { this.failure = e; });
    this.out.write(csvLine(properties));
  }

  static async open(filePath: string, properties: string[]): Promise<CsvFileSink> {
    await fs.promises.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    return new CsvFileSink(fs.createWriteStream(filePath, { encoding: 'utf8' }), properties);
  }

  private fail(e: unknown): FatalError {
    return new FatalError(`Cannot write output: ${e instanceof Error ? e.message : String(e)}`);
  }

  /** Resolves once the stream can take more; throws after a write error. */
  async write(entry: RemoteEntry): Promise<void> {
    if (this.failure) throw this.fail(this.failure);
    this.rows++;
    if (this.out.write(csvLine(project(entry, this.properties)))) return;
    try {
      await once(this.out, 'drain');
    } catch (e) {
      throw this.fail(e);
    }
  }

  async close(): Promise<void> {
    if (!this.failure) this.out.end();
    try {
      await finished(this.out);
    } catch (e) {
      throw this.fail(e);
    }
    if (this.failure) throw this.fail(this.failure);
  }
}

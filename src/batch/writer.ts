import * as fs from 'fs/promises';
import * as path from 'path';
import { createLogger } from '../logger.js';
import type { InteractionRecord } from '../types/npc.js';

const logger = createLogger('interaction-writer');

export type OutputFormat = 'jsonl' | 'json';

/**
 * Destination for interaction records. Opened once per run, closed once.
 */
export interface InteractionSink {
  write(record: InteractionRecord): Promise<void>;
  close(): Promise<void>;
}

/**
 * One JSON object per line, appended as each record is produced
 */
export class JsonlInteractionSink implements InteractionSink {
  private constructor(private readonly handle: fs.FileHandle, readonly filePath: string) {}

  /**
   * Create (or truncate) the log file and its directory
   */
  static async open(filePath: string): Promise<JsonlInteractionSink> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const handle = await fs.open(filePath, 'w');
    logger.debug({ filePath }, 'JSONL log opened');
    return new JsonlInteractionSink(handle, filePath);
  }

  async write(record: InteractionRecord): Promise<void> {
    await this.handle.appendFile(`${JSON.stringify(record)}\n`, 'utf-8');
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

/**
 * Collects records and writes them as one pretty-printed JSON array on close
 */
export class JsonArrayInteractionSink implements InteractionSink {
  private readonly records: InteractionRecord[] = [];

  private constructor(readonly filePath: string) {}

  static async open(filePath: string): Promise<JsonArrayInteractionSink> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    return new JsonArrayInteractionSink(filePath);
  }

  async write(record: InteractionRecord): Promise<void> {
    this.records.push(record);
  }

  async close(): Promise<void> {
    await fs.writeFile(this.filePath, JSON.stringify(this.records, null, 2), 'utf-8');
  }
}

export async function openInteractionSink(filePath: string, format: OutputFormat): Promise<InteractionSink> {
  return format === 'jsonl'
    ? JsonlInteractionSink.open(filePath)
    : JsonArrayInteractionSink.open(filePath);
}

import * as fs from 'fs/promises';
import { z } from 'zod';
import { createLogger } from '../logger.js';
import { InputFileNotFoundError, InputValidationError, type InputIssue } from '../errors.js';
import type { PlayerMessage } from '../types/npc.js';

const logger = createLogger('message-loader');

const IsoDateTimeSchema = z.string().datetime({ local: true, offset: true });
const IsoDateSchema = z.string().date();

const RawMessageSchema = z.object({
  player_id: z.number().int(),
  text: z.string(),
  timestamp: z
    .string()
    .refine((value) => IsoDateTimeSchema.safeParse(value).success || IsoDateSchema.safeParse(value).success, {
      message: 'timestamp must be an ISO-8601 date or date-time',
    }),
});

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const SECONDS_FRACTION = /(T\d{2}:\d{2}:\d{2})\.(\d+)/;

/**
 * Split an ISO-8601 timestamp into epoch milliseconds and the nanoseconds
 * beyond them. A date without a time is local midnight, like a date-time
 * without an offset.
 */
export function parseTimestamp(timestamp: string): { time: number; subMillis: number } {
  if (DATE_ONLY.test(timestamp)) {
    return { time: Date.parse(`${timestamp}T00:00:00`), subMillis: 0 };
  }

  const match = SECONDS_FRACTION.exec(timestamp);
  if (!match) {
    return { time: Date.parse(timestamp), subMillis: 0 };
  }

  const [, clock, digits] = match;
  const millis = digits.slice(0, 3).padEnd(3, '0');
  const nanos = digits.slice(3, 9).padEnd(6, '0');
  return {
    time: Date.parse(timestamp.replace(SECONDS_FRACTION, `${clock}.${millis}`)),
    subMillis: Number(nanos),
  };
}

/**
 * Validate a parsed JSON document as a batch of player messages.
 * Every bad entry is reported, not just the first.
 */
export function parseMessages(raw: unknown): PlayerMessage[] {
  if (!Array.isArray(raw)) {
    throw new InputValidationError('Input must be a JSON array of messages');
  }

  const messages: PlayerMessage[] = [];
  const issues: InputIssue[] = [];

  raw.forEach((entry: unknown, index) => {
    const parsed = RawMessageSchema.safeParse(entry);
    if (!parsed.success) {
      const message = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(entry)'}: ${issue.message}`)
        .join('; ');
      issues.push({ index, message });
      return;
    }

    messages.push({ ...parsed.data, ...parseTimestamp(parsed.data.timestamp) });
  });

  if (issues.length > 0) {
    const summary = issues.map((issue) => `#${issue.index} ${issue.message}`).join(', ');
    throw new InputValidationError(`Invalid message records: ${summary}`, issues);
  }

  return messages;
}

/**
 * Ascending by timestamp. Array#sort is stable, so ties keep input order.
 */
export function sortMessages(messages: readonly PlayerMessage[]): PlayerMessage[] {
  return [...messages].sort((a, b) => a.time - b.time || a.subMillis - b.subMillis);
}

/**
 * Read, validate and chronologically order the input batch.
 * A missing file aborts the run before anything is processed.
 */
export async function loadMessages(filePath: string): Promise<PlayerMessage[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new InputFileNotFoundError(filePath);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new InputValidationError(`Input file is not valid JSON: ${message}`);
  }

  const messages = sortMessages(parseMessages(raw));
  logger.info({ filePath, count: messages.length }, 'Messages loaded');
  return messages;
}

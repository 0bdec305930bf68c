import { createLogger } from '../logger.js';
import { loadMessages } from './loader.js';
import { openInteractionSink, type OutputFormat } from './writer.js';
import { summarize, type RunSummary } from './summary.js';
import type { NpcChatSystem } from '../core/chat-system.js';
import type { InteractionRecord } from '../types/npc.js';

const logger = createLogger('batch-runner');

export interface BatchRunOptions {
  inputFile: string;
  outputFile: string;
  outputFormat: OutputFormat;
  system: NpcChatSystem;
}

export interface BatchRunResult {
  records: InteractionRecord[];
  summary: RunSummary;
}

/**
 * Replay every message of the input file in timestamp order, one at a time.
 *
 * Input errors abort before the output file is touched. Reply failures never
 * abort: the generator has already replaced them with the fallback text.
 */
export async function runBatch(options: BatchRunOptions): Promise<BatchRunResult> {
  const { inputFile, outputFile, outputFormat, system } = options;

  const messages = await loadMessages(inputFile);
  const records: InteractionRecord[] = [];

  logger.info({ count: messages.length, outputFile, outputFormat }, 'Processing messages');

  const sink = await openInteractionSink(outputFile, outputFormat);
  try {
    for (const [index, message] of messages.entries()) {
      const record = await system.processMessage(message);
      await sink.write(record);
      records.push(record);

      logger.info(
        {
          progress: `${index + 1}/${messages.length}`,
          playerId: record.player_id,
          npc: record.npc_name,
          mood: record.npc_mood,
          timestamp: record.timestamp,
        },
        `Player ${record.player_id}: ${record.player_message} → ${record.npc_name} (${record.npc_role}, ${record.npc_mood}): ${record.npc_response}`
      );
    }
  } finally {
    await sink.close();
  }

  const summary = summarize(records, system.getPlayerStates());
  logger.info({ summary, outputFile }, 'Processing complete');

  return { records, summary };
}

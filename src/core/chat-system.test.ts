import { describe, it, expect, beforeEach } from 'vitest';
import { NpcChatSystem } from './chat-system.js';
import { PersonaRegistry } from './personas.js';
import { ResponseGenerator } from './generator.js';
import { EXTENDED_TRIGGERS } from './mood.js';
import type { LLMChatRequest, LLMProvider, LLMStreamChunk } from '../providers/llm/interface.js';
import type { PlayerMessage } from '../types/npc.js';

/**
 * Replies "reply N" to the Nth request, or always fails
 */
class CountingProvider implements LLMProvider {
  readonly name = 'counting';
  readonly requests: LLMChatRequest[] = [];

  constructor(private readonly failing = false) {}

  async *streamChat(request: LLMChatRequest): AsyncIterable<LLMStreamChunk> {
    this.requests.push(request);
    if (this.failing) {
      throw new Error('401 Unauthorized');
    }
    yield { text: `reply ${this.requests.length}`, done: false };
    yield { text: '', done: true };
  }
}

function message(playerId: number, text: string, timestamp = '2024-01-01T10:00:00'): PlayerMessage {
  return { player_id: playerId, text, timestamp, time: Date.parse(timestamp), subMillis: 0 };
}

describe('NpcChatSystem', () => {
  let provider: CountingProvider;
  let system: NpcChatSystem;

  beforeEach(() => {
    provider = new CountingProvider();
    system = new NpcChatSystem({
      registry: new PersonaRegistry(),
      generator: new ResponseGenerator(provider),
    });
  });

  it('should create player state lazily with a neutral mood', () => {
    expect(system.getPlayerStates()).toEqual([]);

    const state = system.getPlayerState(4);

    expect(state.personaKey).toBe('merchant');
    expect(state.mood).toBe('neutral');
    expect(state.history.size).toBe(0);
    expect(system.getPlayerState(4)).toBe(state);
  });

  it('should produce a complete interaction record', async () => {
    const record = await system.processMessage(message(0, 'you are useless', '2024-01-01T09:00:00'));

    expect(record).toEqual({
      timestamp: '2024-01-01T09:00:00',
      player_id: 0,
      player_message: 'you are useless',
      npc_key: 'village_guard',
      npc_name: 'Marcus',
      npc_role: 'Village Guard',
      npc_mood: 'angry',
      npc_response: 'reply 1',
      conversation_history: [],
      fallback: false,
    });
  });

  it('should carry mood between messages from the same player', async () => {
    const first = await system.processMessage(message(0, 'you are useless'));
    const second = await system.processMessage(message(0, 'hello there'));
    const third = await system.processMessage(message(0, 'the weather'));

    expect([first.npc_mood, second.npc_mood, third.npc_mood]).toEqual(['angry', 'friendly', 'friendly']);
  });

  it('should keep mood per player even when players share a persona', async () => {
    await system.processMessage(message(0, 'you are useless'));
    const other = await system.processMessage(message(3, 'the weather'));

    expect(other.npc_key).toBe('village_guard');
    expect(other.npc_mood).toBe('neutral');
    expect(system.getPlayerState(0).mood).toBe('angry');
  });

  it('should exclude the current message from its own history snapshot', async () => {
    await system.processMessage(message(1, 'one'));
    const record = await system.processMessage(message(1, 'two'));

    expect(record.conversation_history).toEqual(['one']);
    expect(provider.requests[1].messages[0].content).toBe(
      'Recent conversation:\n1. Player: one\nCurrent message: two'
    );
  });

  it('should drop the oldest message from context after a fourth message', async () => {
    for (const text of ['one', 'two', 'three', 'four']) {
      await system.processMessage(message(2, text));
    }
    const record = await system.processMessage(message(2, 'five'));

    expect(system.getPlayerState(2).history.toArray()).toEqual(['three', 'four', 'five']);
    expect(record.conversation_history).toEqual(['two', 'three', 'four']);
    expect(provider.requests[4].messages[0].content).toBe(
      'Recent conversation:\n1. Player: two\n2. Player: three\n3. Player: four\nCurrent message: five'
    );
  });

  it('should record the fallback reply when generation fails', async () => {
    const failing = new NpcChatSystem({
      registry: new PersonaRegistry(),
      generator: new ResponseGenerator(new CountingProvider(true)),
    });

    const record = await failing.processMessage(message(2, 'hello'));

    expect(record.npc_response).toBe("*Thorin seems distracted and doesn't respond clearly*");
    expect(record.fallback).toBe(true);
    expect(failing.getPlayerState(2).history.toArray()).toEqual(['hello']);
  });

  it('should honor the configured trigger profile and history size', async () => {
    const custom = new NpcChatSystem({
      registry: new PersonaRegistry(),
      generator: new ResponseGenerator(provider),
      triggers: EXTENDED_TRIGGERS,
      historySize: 1,
    });

    await custom.processMessage(message(0, 'first'));
    const record = await custom.processMessage(message(0, 'where is the inn'));

    expect(record.npc_mood).toBe('helpful');
    expect(custom.getPlayerState(0).history.toArray()).toEqual(['where is the inn']);
  });
});

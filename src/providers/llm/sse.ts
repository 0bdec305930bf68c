/**
 * Yield the payload of every `data:` line of a Server-Sent Events body,
 * stopping at the OpenAI-style `[DONE]` sentinel.
 */
export async function* readSseData(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split('\n');
      buffer = lines.pop() || '';

      for (const line of lines) {
        const trimmed = line.trim();
        if (!trimmed.startsWith('data: ')) continue;

        const data = trimmed.slice(6);
        if (data === '[DONE]') return;
        yield data;
      }
    }

    // Process remaining buffer
    const rest = buffer.trim();
    if (rest.startsWith('data: ') && rest.slice(6) !== '[DONE]') {
      yield rest.slice(6);
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Parse one SSE payload, returning undefined for malformed JSON
 */
export function parseSseJson(data: string): unknown {
  try {
    return JSON.parse(data);
  } catch {
    // Skip malformed JSON
    return undefined;
  }
}

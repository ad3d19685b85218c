export type SseMessage = { event: string; data: string };

/**
 * Splits buffered Server-Sent Events text into complete messages. Whatever
 * follows the last blank line is returned as `rest` to be prefixed to the next read.
 */
export function parseSseBuffer(buffer: string): { messages: SseMessage[]; rest: string } {
  const messages: SseMessage[] = [];
  let rest = buffer;
  let idx: number;

  while ((idx = rest.indexOf('\n\n')) !== -1) {
    const chunk = rest.slice(0, idx);
    rest = rest.slice(idx + 2);

    let event = 'message';
    const data: string[] = [];
    for (const line of chunk.split('\n')) {
      if (line.startsWith('event:')) event = line.slice('event:'.length).trim();
      else if (line.startsWith('data:')) data.push(line.slice('data:'.length).trim());
    }
    if (data.length) messages.push({ event, data: data.join('\n') });
  }

  return { messages, rest };
}

export async function* readSse(body: ReadableStream<Uint8Array>): AsyncGenerator<SseMessage> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const { messages, rest } = parseSseBuffer(buffer);
      buffer = rest;
      yield* messages;
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Writes Server-Sent Events to a stream controller. Once the client has gone
 * away (or the writer was closed) further sends are no-ops returning false.
 */
export class SseWriter {
  private closed = false;
  private readonly encoder = new TextEncoder();

  constructor(private readonly controller: ReadableStreamDefaultController<Uint8Array>) {}

  send(event: string, payload: unknown): boolean {
    if (this.closed) return false;
    try {
      this.controller.enqueue(this.encoder.encode(`event: ${event}\ndata: ${JSON.stringify(payload)}\n\n`));
      return true;
    } catch {
      // enqueue throws once the consumer cancelled the stream
      this.closed = true;
      return false;
    }
  }

  /** Called from the stream's `cancel` hook. */
  markClosed(): void {
    this.closed = true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.controller.close();
  }
}

/** One complete event payload cut from the backend stream. */
export interface RawEvent {
  /** SSE `event:` name in effect for this payload, if any. */
  event?: string;
  data: string;
}

/**
 * Incremental splitter for the backend stream.
 *
 * Accepts both SSE (`data: {...}` lines, `event:` names, `:` comments) and
 * bare newline-delimited JSON. Any other line is emitted as-is. Each `data:` line carries one whole JSON
 * document and is emitted as soon as its line ends, without waiting for the
 * blank dispatch line.
 */
export class EventFramer {
  private readonly decoder = new TextDecoder();
  private buffer = '';
  private eventName: string | undefined;

  push(chunk: Uint8Array | string): RawEvent[] {
    this.buffer += typeof chunk === 'string' ? chunk : this.decoder.decode(chunk, { stream: true });
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';
    return this.consume(lines);
  }

  /** Drains whatever is left once the stream has ended. */
  flush(): RawEvent[] {
    const rest = this.buffer + this.decoder.decode();
    this.buffer = '';
    return rest ? this.consume([rest]) : [];
  }

  private consume(lines: string[]): RawEvent[] {
    const events: RawEvent[] = [];
    for (const raw of lines) {
      const event = this.readLine(raw.replace(/\r$/, ''));
      if (event) events.push(event);
    }
    return events;
  }

  private readLine(line: string): RawEvent | null {
    if (line.trim() === '') {
      this.eventName = undefined;
      return null;
    }
    if (line.startsWith(':')) return null;

    const trimmed = line.trimStart();
    if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
      return { data: trimmed };
    }

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);

    switch (field) {
      case 'data':
        return this.eventName ? { event: this.eventName, data: value } : { data: value };
      case 'event':
        this.eventName = value.trim() || undefined;
        return null;
      case 'id':
      case 'retry':
        return null;
      default:
        // Not SSE and not JSON (e.g. a proxy's error page); passed on whole so
        // the decoder reports it as malformed.
        return { data: line };
    }
  }
}
